/**
 * Release orchestration tests
 */
import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { runRelease, archiveFileName, assertSafeIdentifier } from '../src/release';
import { DEFAULT_CONFIG } from '../src/config';
import {
  InvalidIdentifierError,
  InvalidVersionError,
  IOFailureError,
  MalformedDocumentError,
  ManifestNotFoundError,
  MissingFieldError,
  PatchMismatchError,
  ReleaseAbortedError,
} from '../src/errors';
import { Logger } from '../src/utils/logger';
import type { ReleaseConfig } from '../src/types';
import {
  createTestProject,
  listZipEntries,
  manifestXml,
  readZipText,
  TestProject,
  writeFile,
} from './helpers/releaseTestHelpers';

describe('Release Module', () => {
  let project: TestProject | undefined;
  let restoreSink: ReturnType<Logger['setSink']>;

  beforeEach(() => {
    restoreSink = Logger.getInstance().setSink(() => undefined);
  });

  afterEach(() => {
    Logger.getInstance().setSink(restoreSink);
    project?.cleanup();
    project = undefined;
  });

  function config(overrides: Partial<ReleaseConfig> = {}): ReleaseConfig {
    return { ...DEFAULT_CONFIG, ...overrides };
  }

  describe('archiveFileName()', () => {
    it('should join identifier and extension', () => {
      assert.strictEqual(archiveFileName('com.example.MyTool', 'xrnx'), 'com.example.MyTool.xrnx');
    });
  });

  describe('assertSafeIdentifier()', () => {
    it('should accept dotted identifiers', () => {
      assert.doesNotThrow(() => assertSafeIdentifier('com.example.MyTool'));
    });

    it('should reject path separators and dot segments', () => {
      for (const id of ['../keep', 'a/b', 'a\\b', '.', '..']) {
        assert.throws(() => assertSafeIdentifier(id), InvalidIdentifierError, id);
      }
    });
  });

  describe('runRelease()', () => {
    it('should bump the version and package the tool', async () => {
      project = createTestProject(manifestXml('MyTool', '0.9'), {
        'a.lua': 'return "a"\n',
        'b.lua': 'return "b"\n',
        'README.md': '# MyTool\n',
      });

      const result = await runRelease({ cwd: project.root, config: config({ layout: 'flat' }) });

      const archivePath = path.join(project.root, 'release', 'MyTool.xrnx');
      assert.deepStrictEqual(result, {
        identifier: 'MyTool',
        previousVersion: '0.9',
        version: '0.10.0',
        archivePath,
        layout: 'flat',
        entries: ['a.lua', 'b.lua', 'README.md', 'manifest.xml'],
      });
      assert.deepStrictEqual(listZipEntries(archivePath), ['a.lua', 'b.lua', 'README.md', 'manifest.xml']);
      assert.strictEqual(readZipText(archivePath, 'a.lua'), 'return "a"\n');
      assert.strictEqual(readZipText(archivePath, 'README.md'), '# MyTool\n');
    });

    it('should write the bumped manifest to disk and into the archive', async () => {
      project = createTestProject(manifestXml('MyTool', '0.9'), { 'main.lua': '' });

      const result = await runRelease({ cwd: project.root, config: config({ layout: 'flat' }) });

      const onDisk = fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8');
      assert.strictEqual(onDisk, manifestXml('MyTool', '0.10.0'));
      assert.strictEqual(readZipText(result.archivePath, 'manifest.xml'), onDisk);
    });

    it('should wrap entries in a folder named after the archive by default', async () => {
      project = createTestProject(manifestXml('com.example.Tool', '1.2.3'), { 'main.lua': '' });

      const result = await runRelease({ cwd: project.root, config: config() });

      assert.strictEqual(result.version, '1.3.0');
      assert.deepStrictEqual(listZipEntries(result.archivePath), [
        'com.example.Tool.xrnx/',
        'com.example.Tool.xrnx/main.lua',
        'com.example.Tool.xrnx/manifest.xml',
      ]);
    });

    it('should keep patch for a pre-release version', async () => {
      project = createTestProject(manifestXml('MyTool', '3.4.5-rc1'));

      const result = await runRelease({ cwd: project.root, config: config() });

      assert.strictEqual(result.version, '3.5.5-rc1');
      assert.ok(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8').includes('<Version>3.5.5-rc1</Version>'));
    });

    it('should package only the manifest when there are no scripts', async () => {
      project = createTestProject(manifestXml('Empty', '1'));

      const result = await runRelease({ cwd: project.root, config: config({ layout: 'flat' }) });

      assert.deepStrictEqual(listZipEntries(result.archivePath), ['manifest.xml']);
    });

    it('should produce identical archives for identical projects', async () => {
      const first = createTestProject(manifestXml('MyTool', '1.0'), { 'a.lua': 'a', 'b.lua': 'b' });
      const second = createTestProject(manifestXml('MyTool', '1.0'), { 'b.lua': 'b', 'a.lua': 'a' });
      try {
        const a = await runRelease({ cwd: first.root, config: config() });
        const b = await runRelease({ cwd: second.root, config: config() });
        assert.ok(fs.readFileSync(a.archivePath).equals(fs.readFileSync(b.archivePath)));
      } finally {
        first.cleanup();
        second.cleanup();
      }
    });

    it('should replace a previous release directory', async () => {
      project = createTestProject(manifestXml('MyTool', '1.0'), {
        'main.lua': '',
        'release/MyTool.xrnx/stale.lua': 'stale',
      });

      const result = await runRelease({ cwd: project.root, config: config({ layout: 'flat' }) });

      assert.ok(fs.statSync(result.archivePath).isFile());
      assert.deepStrictEqual(listZipEntries(result.archivePath), ['main.lua', 'manifest.xml']);
    });

    it('should honour a custom release directory', async () => {
      project = createTestProject(manifestXml('MyTool', '1.0'));

      const result = await runRelease({ cwd: project.root, config: config({ releaseDir: 'out/dist' }) });

      assert.strictEqual(result.archivePath, path.join(project.root, 'out', 'dist', 'MyTool.xrnx'));
      assert.ok(fs.existsSync(result.archivePath));
    });

    it('should fail without a manifest and create nothing', async () => {
      project = createTestProject(null, { 'main.lua': '' });

      await assert.rejects(runRelease({ cwd: project.root, config: config() }), ManifestNotFoundError);

      assert.strictEqual(fs.existsSync(path.join(project.root, 'release')), false);
    });

    it('should fail on a missing Id and leave the manifest untouched', async () => {
      const text = '<RenoiseScriptingTool>\n  <Version>1.0</Version>\n</RenoiseScriptingTool>\n';
      project = createTestProject(text);

      await assert.rejects(
        runRelease({ cwd: project.root, config: config() }),
        (error: unknown) => error instanceof MissingFieldError && error.field === 'Id',
      );

      assert.strictEqual(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'), text);
      assert.strictEqual(fs.existsSync(path.join(project.root, 'release')), false);
    });

    it('should fail on malformed XML before writing anything', async () => {
      const text = '<RenoiseScriptingTool><Id>X</Id><Version>1.0</Version>';
      project = createTestProject(text);

      await assert.rejects(runRelease({ cwd: project.root, config: config() }), MalformedDocumentError);

      assert.strictEqual(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'), text);
    });

    it('should fail on an invalid version before writing anything', async () => {
      const text = manifestXml('MyTool', '1.2.3.4');
      project = createTestProject(text);

      await assert.rejects(runRelease({ cwd: project.root, config: config() }), InvalidVersionError);

      assert.strictEqual(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'), text);
      assert.strictEqual(fs.existsSync(path.join(project.root, 'release')), false);
    });

    it('should refuse an Id that leaves the release directory', async () => {
      const text = manifestXml('../keep', '1.0');
      project = createTestProject(text, { 'main.lua': '', 'keep.xrnx/important.txt': 'keep me' });

      await assert.rejects(
        runRelease({ cwd: project.root, config: config({ layout: 'flat' }) }),
        (error: unknown) => error instanceof InvalidIdentifierError && error.identifier === '../keep',
      );

      assert.strictEqual(fs.readFileSync(path.join(project.root, 'keep.xrnx', 'important.txt'), 'utf8'), 'keep me');
      assert.strictEqual(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'), text);
      assert.strictEqual(fs.existsSync(path.join(project.root, 'release')), false);
    });

    it('should reject a manifest that is not valid UTF-8 and leave its bytes alone', async () => {
      project = createTestProject(null);
      const bytes = Buffer.concat([
        Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?>\n<!-- caf'),
        Buffer.from([0xe9]),
        Buffer.from(' -->\n<Tool><Id>MyTool</Id><Version>1.0</Version></Tool>\n'),
      ]);
      const manifestPath = writeFile(project.root, 'manifest.xml', bytes);

      await assert.rejects(
        runRelease({ cwd: project.root, config: config() }),
        (error: unknown) => error instanceof MalformedDocumentError && error.message === 'Malformed manifest: not valid UTF-8',
      );

      assert.ok(fs.readFileSync(manifestPath).equals(bytes));
      assert.strictEqual(fs.existsSync(path.join(project.root, 'release')), false);
    });

    it('should keep a byte order mark when writing the manifest back', async () => {
      const text = '\ufeff' + manifestXml('MyTool', '1.0');
      project = createTestProject(text);

      await runRelease({ cwd: project.root, config: config() });

      assert.strictEqual(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'), '\ufeff' + manifestXml('MyTool', '1.1.0'));
    });

    it('should fail when the version text cannot be patched', async () => {
      const text = '<Tool><Id>MyTool</Id><Version> 1.0 </Version></Tool>';
      project = createTestProject(text);

      await assert.rejects(runRelease({ cwd: project.root, config: config() }), PatchMismatchError);

      assert.strictEqual(fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'), text);
    });

    it('should report that the manifest changed when packaging fails', async () => {
      // a regular file where the release directory should go
      project = createTestProject(manifestXml('MyTool', '2.0'), { 'main.lua': '', blocked: '' });

      await assert.rejects(
        runRelease({ cwd: project.root, config: config({ releaseDir: 'blocked' }) }),
        (error: unknown) =>
          error instanceof ReleaseAbortedError &&
          error.manifestUpdated &&
          error.version === '2.1.0' &&
          error.cause instanceof IOFailureError,
      );

      assert.strictEqual(
        fs.readFileSync(path.join(project.root, 'manifest.xml'), 'utf8'),
        manifestXml('MyTool', '2.1.0'),
      );
    });

    it('should load configuration from the project directory when none is given', async () => {
      project = createTestProject(manifestXml('MyTool', '1.0'), {
        'main.lua': '',
        '.xrnx-release.yml': 'layout: flat\narchiveExtension: zip\n',
      });

      const result = await runRelease({ cwd: project.root });

      assert.strictEqual(result.archivePath, path.join(project.root, 'release', 'MyTool.zip'));
      assert.deepStrictEqual(result.entries, ['main.lua', 'manifest.xml']);
    });
  });
});
