/**
 * ChannelRegistry Tests
 *
 * Tests:
 * - Predefined channels and their defaults
 * - Overrides for predefined channels
 * - Custom channel registration
 * - Debug level switch
 * - Process-wide registry lifecycle (getRegistry / initRegistry / reset)
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';

import {
  ChannelRegistry,
  BufferTarget,
  NullTarget,
  OutputLogger,
  ConfigurationError,
  PREDEFINED_CHANNELS,
  getRegistry,
  initRegistry,
  resetRegistryForTests,
} from '@msgstream/core';

function quietOptions() {
  return {
    output: new BufferTarget(),
    logger: new OutputLogger('silent', new NullTarget()),
    terminate: () => {},
  };
}

describe('ChannelRegistry', () => {
  afterEach(() => {
    resetRegistryForTests();
  });

  describe('predefined channels', () => {
    it('should provide the four predefined channels', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.strictEqual(registry.info.title, 'Info');
      assert.strictEqual(registry.info.severity, 'info');
      assert.strictEqual(registry.warning.title, 'Warning');
      assert.strictEqual(registry.warning.severity, 'warning');
      assert.strictEqual(registry.seriousError.title, 'Serious Error');
      assert.strictEqual(registry.seriousError.severity, 'serious');
      assert.strictEqual(registry.fatalError.title, 'FATAL ERROR');
      assert.strictEqual(registry.fatalError.severity, 'fatal');
    });

    it('should cap serious errors at 100 by default', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.strictEqual(registry.seriousError.maxErrors, 100);
      assert.strictEqual(registry.warning.maxErrors, 0);
      assert.strictEqual(PREDEFINED_CHANNELS.seriousError.maxErrors, 100);
    });

    it('should list the predefined names in order', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.deepStrictEqual(registry.names(), ['info', 'warning', 'seriousError', 'fatalError']);
      assert.strictEqual(registry.get('warning'), registry.warning);
    });

    it('should share one environment between channels', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.strictEqual(registry.info.environment, registry.environment);
      assert.strictEqual(registry.fatalError.environment, registry.environment);
    });

    it('should apply overrides to predefined channels', () => {
      const registry = new ChannelRegistry({ ...quietOptions(), channels: { warning: { maxErrors: 5 } } });

      assert.strictEqual(registry.warning.maxErrors, 5);
      assert.strictEqual(registry.warning.title, 'Warning');
      assert.strictEqual(registry.warning.severity, 'warning');
    });
  });

  describe('register()', () => {
    it('should add a custom channel', () => {
      const registry = new ChannelRegistry(quietOptions());

      const channel = registry.register('meshCheck', { title: 'Mesh Check', severity: 'warning', maxErrors: 10 });

      assert.strictEqual(registry.get('meshCheck'), channel);
      assert.strictEqual(channel.environment, registry.environment);
      assert.deepStrictEqual(registry.names(), ['info', 'warning', 'seriousError', 'fatalError', 'meshCheck']);
    });

    it('should reject a duplicate name', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.throws(
        () => registry.register('warning', { title: 'Other', severity: 'info', maxErrors: 0 }),
        (err: unknown) => err instanceof ConfigurationError && err.code === 'ERR_CONFIG_INVALID'
      );
    });

    it('should return undefined for unknown names', () => {
      const registry = new ChannelRegistry(quietOptions());
      assert.strictEqual(registry.get('nope'), undefined);
    });
  });

  describe('debugLevel', () => {
    it('should default to 0', () => {
      const registry = new ChannelRegistry(quietOptions());
      assert.strictEqual(registry.debugLevel, 0);
    });

    it('should be adjustable at runtime', () => {
      const registry = new ChannelRegistry({ ...quietOptions(), debugLevel: 1 });

      registry.setDebugLevel(3);

      assert.strictEqual(registry.debugLevel, 3);
    });

    it('should reject negative levels', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.throws(() => registry.setDebugLevel(-1), ConfigurationError);
      assert.throws(() => new ChannelRegistry({ ...quietOptions(), debugLevel: 0.5 }), ConfigurationError);
    });
  });

  describe('process-wide registry', () => {
    it('should create one default registry lazily', () => {
      const first = getRegistry();
      const second = getRegistry();

      assert.ok(first instanceof ChannelRegistry);
      assert.strictEqual(first, second);
    });

    it('should install a registry built from options', () => {
      const installed = initRegistry({ ...quietOptions(), debugLevel: 2 });

      assert.strictEqual(getRegistry(), installed);
      assert.strictEqual(getRegistry().debugLevel, 2);
    });

    it('should install a prebuilt registry', () => {
      const registry = new ChannelRegistry(quietOptions());

      assert.strictEqual(initRegistry(registry), registry);
      assert.strictEqual(getRegistry(), registry);
    });

    it('should forget the registry on reset', () => {
      const installed = initRegistry(quietOptions());

      resetRegistryForTests();

      assert.notStrictEqual(getRegistry(), installed);
    });
  });
});
