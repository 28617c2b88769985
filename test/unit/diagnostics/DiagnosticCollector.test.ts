/**
 * DiagnosticCollector Tests
 *
 * Tests:
 * - addError() keeps StyxError details, wraps plain errors as ERR_UNKNOWN
 * - scope (input/backend) from the caller wins over the error's context
 * - getByInput(), getByBackend(), getByCode() filtering
 * - hasFatal(), hasErrors(), hasWarnings()
 * - toDiagnosticsLog() returns JSON lines, summary() counts by severity
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import { BackendError, ConfigError, DiagnosticCollector, IrError } from '@styx/core';

describe('DiagnosticCollector', () => {
  let collector: DiagnosticCollector;

  beforeEach(() => {
    collector = new DiagnosticCollector();
  });

  describe('addError()', () => {
    it('should keep code, severity and suggestion of a StyxError', () => {
      const error = new BackendError(
        'File build/python/pkg/bet.py already exists',
        'ERR_WRITE_CONFLICT',
        { input: 'bet.json', backend: 'python' },
        'Use --force to overwrite existing files'
      );
      const diagnostic = collector.addError(error);

      assert.strictEqual(diagnostic.code, 'ERR_WRITE_CONFLICT');
      assert.strictEqual(diagnostic.severity, 'error');
      assert.strictEqual(diagnostic.message, 'File build/python/pkg/bet.py already exists');
      assert.strictEqual(diagnostic.input, 'bet.json');
      assert.strictEqual(diagnostic.backend, 'python');
      assert.strictEqual(diagnostic.suggestion, 'Use --force to overwrite existing files');
      assert.strictEqual(typeof diagnostic.timestamp, 'number');
    });

    it('should prefer the caller scope over the error context', () => {
      const error = new IrError('bad default', 'ERR_IR_DEFAULT_TYPE', { input: 'from-error.json' });
      const diagnostic = collector.addError(error, { input: 'bet.json', backend: 'typescript' });

      assert.strictEqual(diagnostic.input, 'bet.json');
      assert.strictEqual(diagnostic.backend, 'typescript');
      assert.strictEqual(diagnostic.severity, 'fatal');
    });

    it('should wrap plain errors as ERR_UNKNOWN', () => {
      const diagnostic = collector.addError(new Error('ENOENT: missing.json'), { input: 'missing.json' });

      assert.strictEqual(diagnostic.code, 'ERR_UNKNOWN');
      assert.strictEqual(diagnostic.severity, 'error');
      assert.strictEqual(diagnostic.message, 'ENOENT: missing.json');
      assert.strictEqual(diagnostic.input, 'missing.json');
      assert.strictEqual(diagnostic.suggestion, undefined);
    });

    it('should stringify thrown non-errors', () => {
      const diagnostic = collector.addError('boom');
      assert.strictEqual(diagnostic.message, 'boom');
    });
  });

  describe('filtering', () => {
    beforeEach(() => {
      collector.addError(new IrError('a', 'ERR_IR_FORMAT'), { input: 'a.json' });
      collector.addError(new Error('b'), { input: 'b.json', backend: 'python' });
      collector.addError(new Error('c'), { input: 'a.json', backend: 'typescript' });
    });

    it('getByInput()', () => {
      assert.deepStrictEqual(collector.getByInput('a.json').map(d => d.message), ['a', 'c']);
    });

    it('getByBackend()', () => {
      assert.deepStrictEqual(collector.getByBackend('python').map(d => d.message), ['b']);
    });

    it('getByCode()', () => {
      assert.deepStrictEqual(collector.getByCode('ERR_UNKNOWN').map(d => d.message), ['b', 'c']);
    });

    it('getAll() should return a copy', () => {
      const all = collector.getAll();
      all.pop();
      assert.strictEqual(collector.count(), 3);
    });
  });

  describe('severity queries', () => {
    it('should report nothing when empty', () => {
      assert.strictEqual(collector.hasFatal(), false);
      assert.strictEqual(collector.hasErrors(), false);
      assert.strictEqual(collector.hasWarnings(), false);
    });

    it('should count fatal as an error', () => {
      collector.addError(new ConfigError('bad', 'ERR_CONFIG_INVALID'));
      assert.strictEqual(collector.hasFatal(), true);
      assert.strictEqual(collector.hasErrors(), true);
    });

    it('should not count warnings as errors', () => {
      collector.add({ code: 'W_TEST', severity: 'warning', message: 'careful' });
      assert.strictEqual(collector.hasErrors(), false);
      assert.strictEqual(collector.hasWarnings(), true);
    });
  });

  describe('output', () => {
    it('toDiagnosticsLog() should write one JSON object per line', () => {
      collector.add({ code: 'ERR_UNKNOWN', severity: 'error', message: 'one', input: 'a.json' });
      collector.add({ code: 'ERR_UNKNOWN', severity: 'error', message: 'two', backend: 'ir' });

      const lines = collector.toDiagnosticsLog().split('\n');
      assert.strictEqual(lines.length, 2);
      const first: unknown = JSON.parse(lines[0]);
      assert.ok(typeof first === 'object' && first !== null);
      assert.strictEqual('message' in first && first.message, 'one');
      assert.strictEqual('input' in first && first.input, 'a.json');
    });

    it('summary() should count by severity', () => {
      assert.strictEqual(collector.summary(), 'No issues found.');
      collector.add({ code: 'F', severity: 'fatal', message: 'x' });
      collector.add({ code: 'E', severity: 'error', message: 'y' });
      collector.add({ code: 'E', severity: 'error', message: 'z' });
      collector.add({ code: 'W', severity: 'warning', message: 'w' });
      assert.strictEqual(collector.summary(), 'Fatal: 1, Errors: 2, Warnings: 1');
    });

    it('clear() should drop everything', () => {
      collector.add({ code: 'E', severity: 'error', message: 'y' });
      collector.clear();
      assert.strictEqual(collector.count(), 0);
    });
  });
});
