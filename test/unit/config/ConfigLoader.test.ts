/**
 * ConfigLoader Tests
 *
 * Tests:
 * - YAML config loading (valid, partial, invalid)
 * - JSON config loading (deprecated, valid, invalid)
 * - YAML takes precedence over JSON
 * - No config returns defaults
 * - Edge cases (empty file, comments only, null channel entries)
 * - Validation errors
 * - Version compatibility
 * - Building a registry from a loaded config
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  BufferTarget,
  ConfigurationError,
  DEFAULT_CONFIG,
  MSGSTREAM_VERSION,
  NullTarget,
  OutputLogger,
  TerminationError,
  createRegistryFromConfig,
  getSchemaVersion,
  loadConfig,
  validateVersion,
} from '@msgstream/core';

// =============================================================================
// Test Helpers
// =============================================================================

interface LoggerMock {
  warnings: string[];
  warn: (msg: string) => void;
}

function createLoggerMock(): LoggerMock {
  const warnings: string[] = [];
  return {
    warnings,
    warn: (msg: string) => warnings.push(msg),
  };
}

function isConfigError(code: string, message: RegExp) {
  return (err: unknown): boolean =>
    err instanceof ConfigurationError && err.code === code && message.test(err.message);
}

// =============================================================================
// TESTS: ConfigLoader
// =============================================================================

describe('ConfigLoader', () => {
  let testDir: string;
  let configDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'msgstream-config-'));
    configDir = join(testDir, '.msgstream');
    mkdirSync(configDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // TESTS: YAML config
  // ===========================================================================

  describe('YAML config', () => {
    it('should load valid YAML config', () => {
      const yaml = `debugLevel: 2
logLevel: info
termination: throw
channels:
  seriousError:
    maxErrors: 5
  meshCheck:
    title: "Mesh Check"
    severity: Warning
    maxErrors: 10
`;
      writeFileSync(join(configDir, 'config.yaml'), yaml);

      const config = loadConfig(testDir);

      assert.strictEqual(config.debugLevel, 2);
      assert.strictEqual(config.logLevel, 'info');
      assert.strictEqual(config.termination, 'throw');
      assert.deepStrictEqual(config.channels, {
        seriousError: { title: 'Serious Error', severity: 'serious', maxErrors: 5 },
        meshCheck: { title: 'Mesh Check', severity: 'warning', maxErrors: 10 },
      });
    });

    it('should merge partial YAML config with defaults', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'debugLevel: 1\n');

      const config = loadConfig(testDir);

      assert.strictEqual(config.debugLevel, 1);
      assert.strictEqual(config.logLevel, DEFAULT_CONFIG.logLevel);
      assert.strictEqual(config.termination, DEFAULT_CONFIG.termination);
      assert.strictEqual(config.logFile, undefined);
      assert.deepStrictEqual(config.channels, {});
    });

    it('should handle invalid YAML gracefully', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'debugLevel: [1, 2\n');

      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config, DEFAULT_CONFIG, 'should return defaults on parse error');
      assert.strictEqual(logger.warnings.length, 2);
      assert.ok(logger.warnings[0].startsWith('Failed to parse config.yaml: '));
      assert.strictEqual(logger.warnings[1], 'Using default configuration');
    });

    it('should give predefined channels their defaults for a null entry', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'channels:\n  info:\n');

      const config = loadConfig(testDir);

      assert.deepStrictEqual(config.channels, {
        info: { title: 'Info', severity: 'info', maxErrors: 0 },
      });
    });

    it('should resolve logFile against the project root', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'logFile: .msgstream/msgstream.log\n');

      const config = loadConfig(testDir);

      assert.strictEqual(config.logFile, join(testDir, '.msgstream', 'msgstream.log'));
    });
  });

  // ===========================================================================
  // TESTS: JSON config (deprecated)
  // ===========================================================================

  describe('JSON config (deprecated)', () => {
    it('should load valid JSON config and warn about deprecation', () => {
      writeFileSync(join(configDir, 'config.json'), JSON.stringify({ debugLevel: 3 }));

      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.strictEqual(config.debugLevel, 3);
      assert.deepStrictEqual(logger.warnings, [
        'config.json is deprecated. Move its settings to .msgstream/config.yaml',
      ]);
    });

    it('should handle invalid JSON gracefully', () => {
      writeFileSync(join(configDir, 'config.json'), '{ "debugLevel": ');

      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.deepStrictEqual(config, DEFAULT_CONFIG);
      assert.ok(logger.warnings.some((w) => w.startsWith('Failed to parse config.json: ')));
      assert.strictEqual(logger.warnings[logger.warnings.length - 1], 'Using default configuration');
    });
  });

  // ===========================================================================
  // TESTS: Precedence and missing config
  // ===========================================================================

  describe('precedence', () => {
    it('should prefer YAML when both exist', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'debugLevel: 1\n');
      writeFileSync(join(configDir, 'config.json'), JSON.stringify({ debugLevel: 9 }));

      const logger = createLoggerMock();
      const config = loadConfig(testDir, logger);

      assert.strictEqual(config.debugLevel, 1);
      assert.deepStrictEqual(logger.warnings, [], 'should not warn about JSON when YAML exists');
    });

    it('should return defaults when no config exists', () => {
      const logger = createLoggerMock();

      assert.deepStrictEqual(loadConfig(testDir, logger), DEFAULT_CONFIG);
      assert.deepStrictEqual(logger.warnings, []);
    });

    it('should hand out a fresh default config on every load', () => {
      const first = loadConfig(testDir);
      first.debugLevel = 7;
      first.channels.solver = { title: 'Solver', severity: 'fatal', maxErrors: 0 };

      const second = loadConfig(testDir);

      assert.notStrictEqual(second, first);
      assert.notStrictEqual(second, DEFAULT_CONFIG);
      assert.deepStrictEqual(second, DEFAULT_CONFIG);
      assert.deepStrictEqual(DEFAULT_CONFIG.channels, {});
    });

    it('should hand out a fresh default config for an empty file', () => {
      writeFileSync(join(configDir, 'config.yaml'), '');

      loadConfig(testDir).channels.solver = { title: 'Solver', severity: 'fatal', maxErrors: 0 };

      assert.deepStrictEqual(loadConfig(testDir).channels, {});
    });

    it('should return defaults when .msgstream directory does not exist', () => {
      rmSync(configDir, { recursive: true });

      assert.deepStrictEqual(loadConfig(testDir), DEFAULT_CONFIG);
    });
  });

  // ===========================================================================
  // TESTS: Edge cases
  // ===========================================================================

  describe('edge cases', () => {
    it('should handle empty YAML file', () => {
      writeFileSync(join(configDir, 'config.yaml'), '');

      assert.deepStrictEqual(loadConfig(testDir), DEFAULT_CONFIG, 'empty file should return defaults');
    });

    it('should handle YAML with only comments', () => {
      writeFileSync(join(configDir, 'config.yaml'), '# debugLevel: 1\n# termination: throw\n');

      assert.deepStrictEqual(loadConfig(testDir), DEFAULT_CONFIG, 'comments-only file should return defaults');
    });
  });

  // ===========================================================================
  // TESTS: Validation
  // ===========================================================================

  describe('validation', () => {
    it('should throw when a custom channel has no title', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'channels:\n  solver:\n    severity: serious\n');

      assert.throws(
        () => loadConfig(testDir),
        isConfigError('ERR_CONFIG_MISSING_FIELD', /^Config error: channels\.solver\.title is required$/)
      );
    });

    it('should throw on an unknown severity', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'channels:\n  warning:\n    severity: loud\n');

      assert.throws(() => loadConfig(testDir), isConfigError('ERR_CONFIG_INVALID', /channels\.warning\.severity/));
    });

    it('should throw on a negative debugLevel', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'debugLevel: -1\n');

      assert.throws(
        () => loadConfig(testDir),
        isConfigError('ERR_CONFIG_INVALID', /^Config error: debugLevel must be a non-negative integer, got -1$/)
      );
    });

    it('should throw on an unknown logLevel', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'logLevel: verbose\n');

      assert.throws(
        () => loadConfig(testDir),
        isConfigError(
          'ERR_CONFIG_INVALID',
          /^Config error: logLevel must be one of silent, errors, warnings, info, debug, got "verbose"$/
        )
      );
    });

    it('should throw on an unknown termination mode', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'termination: abort\n');

      assert.throws(() => loadConfig(testDir), isConfigError('ERR_CONFIG_INVALID', /termination must be one of exit, throw/));
    });

    it('should throw when channels is not a mapping', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'channels:\n  - warning\n');

      assert.throws(() => loadConfig(testDir), isConfigError('ERR_CONFIG_INVALID', /channels must be a mapping/));
    });

    it('should throw when the document is not a mapping', () => {
      writeFileSync(join(configDir, 'config.yaml'), '- debugLevel\n');

      assert.throws(() => loadConfig(testDir), isConfigError('ERR_CONFIG_INVALID', /^Config error: config must be a mapping$/));
    });
  });

  // ===========================================================================
  // TESTS: Version
  // ===========================================================================

  describe('validateVersion()', () => {
    it('should pass when no version is given', () => {
      validateVersion(undefined);
      validateVersion(null);
    });

    it('should accept the current schema version', () => {
      validateVersion(getSchemaVersion(MSGSTREAM_VERSION));
    });

    it('should ignore pre-release tags', () => {
      validateVersion('1.2.0-beta', '1.2.0');
    });

    it('should reject a different schema version', () => {
      assert.throws(
        () => validateVersion('0.9.0', '1.0.0'),
        isConfigError('ERR_CONFIG_VERSION', /config version "0\.9\.0" is not compatible with msgstream 1\.0\.0/)
      );
    });

    it('should reject empty and non-string versions', () => {
      assert.throws(() => validateVersion('  '), isConfigError('ERR_CONFIG_INVALID', /version cannot be empty/));
      assert.throws(() => validateVersion(1), isConfigError('ERR_CONFIG_INVALID', /version must be a string, got number/));
    });

    it('should reject an incompatible version in a config file', () => {
      writeFileSync(join(configDir, 'config.yaml'), 'version: "99.0.0"\n');

      assert.throws(() => loadConfig(testDir), isConfigError('ERR_CONFIG_VERSION', /99\.0\.0/));
    });
  });

  // ===========================================================================
  // TESTS: createRegistryFromConfig
  // ===========================================================================

  describe('createRegistryFromConfig()', () => {
    it('should apply overrides, custom channels and the termination mode', () => {
      writeFileSync(
        join(configDir, 'config.yaml'),
        `debugLevel: 1
termination: throw
channels:
  warning:
    maxErrors: 2
  meshCheck:
    title: "Mesh Check"
    severity: serious
`
      );
      const output = new BufferTarget();

      const registry = createRegistryFromConfig(loadConfig(testDir), {
        output,
        logger: new OutputLogger('silent', new NullTarget()),
      });

      assert.strictEqual(registry.debugLevel, 1);
      assert.strictEqual(registry.warning.maxErrors, 2);
      assert.strictEqual(registry.get('meshCheck')?.title, 'Mesh Check');
      assert.strictEqual(registry.get('meshCheck')?.severity, 'serious');
      assert.throws(() => registry.fatalError.emit('solve', 'src/solve.ts', 3).end(), TerminationError);
      assert.strictEqual(
        output.contents(),
        '[FATAL] FATAL ERROR in function "solve"\n    in file src/solve.ts at line 3\n'
      );
    });

    it('should build the predefined channels from the default config', () => {
      const registry = createRegistryFromConfig(DEFAULT_CONFIG, {
        output: new BufferTarget(),
        logger: new OutputLogger('silent', new NullTarget()),
        terminate: () => {},
      });

      assert.deepStrictEqual(registry.names(), ['info', 'warning', 'seriousError', 'fatalError']);
      assert.strictEqual(registry.seriousError.maxErrors, 100);
    });
  });
});
