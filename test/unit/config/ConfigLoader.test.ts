/**
 * ConfigLoader Tests
 *
 * Tests:
 * - No config returns defaults
 * - YAML config loading (valid, partial, empty, invalid)
 * - JSON fallback, YAML takes precedence
 * - Invalid fields raise ConfigError naming the field
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, writeFileSync, rmSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { ConfigError, DEFAULT_CONFIG, loadConfig, parseConfig } from '@styx/core';

function assertConfigError(fn: () => unknown, field: string): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof ConfigError);
    assert.strictEqual(error.code, 'ERR_CONFIG_INVALID');
    assert.strictEqual(error.context.field, field);
    return true;
  });
}

describe('ConfigLoader', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `styx-config-${process.pid}-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  describe('defaults', () => {
    it('should return defaults when no config file exists', () => {
      const config = loadConfig(testDir);
      assert.deepStrictEqual(config, DEFAULT_CONFIG);
    });

    it('should not share the default backends array', () => {
      const config = loadConfig(testDir);
      config.backends.push('ir');
      assert.deepStrictEqual(DEFAULT_CONFIG.backends, ['python']);
    });
  });

  describe('YAML config', () => {
    it('should load a full config', () => {
      writeFileSync(join(testDir, 'styx.config.yaml'), `backends:
  - python
  - typescript
outputDir: generated
optimize: false
logLevel: debug
force: true
project:
  name: sample
  license: MIT
package:
  name: sampletools
  version: "1.2.0"
  docker: example/sampletools:1.2.0
  docs:
    title: Sample Tools
    authors: [Jane Doe, John Doe]
`);
      const config = loadConfig(testDir);

      assert.deepStrictEqual(config.backends, ['python', 'typescript']);
      assert.strictEqual(config.outputDir, 'generated');
      assert.strictEqual(config.optimize, false);
      assert.strictEqual(config.logLevel, 'debug');
      assert.strictEqual(config.force, true);
      assert.strictEqual(config.project?.name, 'sample');
      assert.strictEqual(config.project?.license, 'MIT');
      assert.strictEqual(config.package?.name, 'sampletools');
      assert.strictEqual(config.package?.version, '1.2.0');
      assert.strictEqual(config.package?.docker, 'example/sampletools:1.2.0');
      assert.strictEqual(config.package?.docs?.title, 'Sample Tools');
      assert.deepStrictEqual(config.package?.docs?.authors, ['Jane Doe', 'John Doe']);
    });

    it('should merge a partial config with defaults', () => {
      writeFileSync(join(testDir, 'styx.config.yaml'), 'outputDir: out\n');
      const config = loadConfig(testDir);
      assert.deepStrictEqual(config, { ...DEFAULT_CONFIG, outputDir: 'out', project: undefined, package: undefined });
    });

    it('should treat an empty file as defaults', () => {
      writeFileSync(join(testDir, 'styx.config.yaml'), '# nothing yet\n');
      assert.deepStrictEqual(loadConfig(testDir), DEFAULT_CONFIG);
    });

    it('should throw on a syntax error', () => {
      writeFileSync(join(testDir, 'styx.config.yaml'), 'backends: [python\n');
      assert.throws(() => loadConfig(testDir), (error: unknown) => {
        assert.ok(error instanceof ConfigError);
        assert.match(error.message, /^Failed to parse .*styx\.config\.yaml/);
        return true;
      });
    });

    it('should take precedence over JSON', () => {
      writeFileSync(join(testDir, 'styx.config.yaml'), 'outputDir: from-yaml\n');
      writeFileSync(join(testDir, 'styx.config.json'), '{"outputDir": "from-json"}');
      assert.strictEqual(loadConfig(testDir).outputDir, 'from-yaml');
    });
  });

  describe('JSON config', () => {
    it('should load styx.config.json when there is no YAML', () => {
      writeFileSync(join(testDir, 'styx.config.json'), '{"backends": ["ir"], "optimize": false}');
      const config = loadConfig(testDir);
      assert.deepStrictEqual(config.backends, ['ir']);
      assert.strictEqual(config.optimize, false);
      assert.strictEqual(config.outputDir, 'build');
    });
  });

  describe('validation', () => {
    it('should reject an unknown backend', () => {
      assertConfigError(() => parseConfig({ backends: ['python', 'cobol'] }), 'backends[1]');
    });

    it('should reject a non-array backends field', () => {
      assertConfigError(() => parseConfig({ backends: 'python' }), 'backends');
    });

    it('should reject an unknown log level', () => {
      assertConfigError(() => parseConfig({ logLevel: 'loud' }), 'logLevel');
    });

    it('should reject a non-boolean optimize', () => {
      assertConfigError(() => parseConfig({ optimize: 'yes' }), 'optimize');
    });

    it('should reject an empty outputDir', () => {
      assertConfigError(() => parseConfig({ outputDir: '  ' }), 'outputDir');
    });

    it('should reject non-string authors', () => {
      assertConfigError(() => parseConfig({ package: { docs: { authors: ['a', 7] } } }), 'package.docs.authors[1]');
    });

    it('should reject a list as the document root', () => {
      assertConfigError(() => parseConfig(['python']), '(root)');
    });

    it('should name the field in the message', () => {
      assert.throws(
        () => parseConfig({ package: { name: 42 } }),
        { message: 'Config error: package.name must be a string, got number' }
      );
    });
  });
});
