import pino from 'pino';
import {
  AttributeUpdateHandler,
  coerceEnabled,
  coerceFirmwareVersion,
  coerceInterval,
  extractAttributes,
} from './attributes.js';
import { RuntimeConfig } from './state.js';
import { silent } from '../test/helpers.js';

describe('attributes', () => {
  describe('coerceInterval', () => {
    it('should accept positive integers and numeric strings', () => {
      expect(coerceInterval(10)).toBe(10);
      expect(coerceInterval('15')).toBe(15);
      expect(coerceInterval(' 20 ')).toBe(20);
      expect(coerceInterval('1e1')).toBe(10);
    });

    it('should truncate fractional seconds', () => {
      expect(coerceInterval(2.9)).toBe(2);
      expect(coerceInterval('3.5')).toBe(3);
    });

    it('should reject values that are not a positive integer', () => {
      expect(coerceInterval(0)).toBeNull();
      expect(coerceInterval(-1)).toBeNull();
      expect(coerceInterval(0.5)).toBeNull();
      expect(coerceInterval('abc')).toBeNull();
      expect(coerceInterval('')).toBeNull();
      expect(coerceInterval(Infinity)).toBeNull();
      expect(coerceInterval(true)).toBeNull();
      expect(coerceInterval(null)).toBeNull();
      expect(coerceInterval({ seconds: 5 })).toBeNull();
    });

    it('should cap the interval at the longest delay a timer can wait', () => {
      expect(coerceInterval(2147483)).toBe(2147483);
      expect(coerceInterval(2147484)).toBeNull();
      expect(coerceInterval(3000000)).toBeNull();
      expect(coerceInterval('1e300')).toBeNull();
    });
  });

  describe('coerceEnabled', () => {
    it('should accept booleans, 0/1 and common words', () => {
      expect(coerceEnabled(true)).toBe(true);
      expect(coerceEnabled(false)).toBe(false);
      expect(coerceEnabled(1)).toBe(true);
      expect(coerceEnabled(0)).toBe(false);
      expect(coerceEnabled('TRUE')).toBe(true);
      expect(coerceEnabled(' off ')).toBe(false);
      expect(coerceEnabled('yes')).toBe(true);
    });

    it('should reject anything else', () => {
      expect(coerceEnabled('maybe')).toBeNull();
      expect(coerceEnabled(2)).toBeNull();
      expect(coerceEnabled(null)).toBeNull();
      expect(coerceEnabled([])).toBeNull();
    });
  });

  describe('coerceFirmwareVersion', () => {
    it('should stringify scalars', () => {
      expect(coerceFirmwareVersion('2.0')).toBe('2.0');
      expect(coerceFirmwareVersion(3)).toBe('3');
      expect(coerceFirmwareVersion(true)).toBe('true');
    });

    it('should reject objects and null', () => {
      expect(coerceFirmwareVersion(null)).toBeNull();
      expect(coerceFirmwareVersion({ v: 1 })).toBeNull();
    });
  });

  describe('extractAttributes', () => {
    it('should unwrap the shared block of a snapshot response', () => {
      expect(extractAttributes({ shared: { interval: 3 } })).toEqual({ interval: 3 });
    });

    it('should pass flat updates through', () => {
      expect(extractAttributes({ enabled: false })).toEqual({ enabled: false });
    });
  });

  describe('AttributeUpdateHandler', () => {
    const topic = 'v1/devices/me/attributes';

    it('should apply a full snapshot response', () => {
      const config = new RuntimeConfig();
      const handler = new AttributeUpdateHandler(config, silent);

      const changes = handler.handleMessage(
        'v1/devices/me/attributes/response/1',
        JSON.stringify({ shared: { interval: 12, enabled: false, firmware_version: '1.2' } }),
      );

      expect(config.snapshot()).toEqual({ interval: 12, enabled: false, firmwareVersion: '1.2' });
      expect(changes).toEqual([
        { key: 'interval', previous: 5, next: 12 },
        { key: 'enabled', previous: true, next: false },
        { key: 'firmware_version', previous: '1.0', next: '1.2' },
      ]);
    });

    it('should apply the valid fields of a payload with a malformed one', () => {
      const config = new RuntimeConfig();
      const handler = new AttributeUpdateHandler(config, silent);

      const changes = handler.handleMessage(topic, JSON.stringify({ interval: 'soon', enabled: false }));

      expect(config.interval).toBe(5);
      expect(config.enabled).toBe(false);
      expect(changes).toEqual([{ key: 'enabled', previous: true, next: false }]);
    });

    it('should leave fields absent from an incremental update untouched', () => {
      const config = new RuntimeConfig({ enabled: false, firmwareVersion: '3.3' });
      const handler = new AttributeUpdateHandler(config, silent);

      handler.handleMessage(topic, JSON.stringify({ interval: 10 }));

      expect(config.snapshot()).toEqual({ interval: 10, enabled: false, firmwareVersion: '3.3' });
    });

    it('should not roll back an earlier valid write when a later one is invalid', () => {
      const config = new RuntimeConfig();
      const handler = new AttributeUpdateHandler(config, silent);

      handler.handleMessage(topic, JSON.stringify({ interval: 8 }));
      handler.handleMessage(topic, JSON.stringify({ interval: 0 }));

      expect(config.interval).toBe(8);
    });

    it('should ignore payloads that are not JSON objects', () => {
      const config = new RuntimeConfig();
      const handler = new AttributeUpdateHandler(config, silent);

      expect(handler.handleMessage(topic, '{not json')).toEqual([]);
      expect(handler.handleMessage(topic, '[1,2]')).toEqual([]);
      expect(handler.handleMessage(topic, '42')).toEqual([]);
      expect(config.snapshot()).toEqual({ interval: 5, enabled: true, firmwareVersion: '1.0' });
    });

    it('should treat an update with only unknown keys as a no-op', () => {
      const logger = pino({ level: 'silent' });
      const debug = vi.spyOn(logger, 'debug');
      const config = new RuntimeConfig();
      const handler = new AttributeUpdateHandler(config, logger);

      expect(handler.apply({ color: 'red' })).toEqual([]);
      expect(debug).toHaveBeenCalledWith({ keys: ['color'] }, 'attribute update has no recognized keys');
      expect(config.snapshot()).toEqual({ interval: 5, enabled: true, firmwareVersion: '1.0' });
    });

    it('should not report a change when the value is the same', () => {
      const handler = new AttributeUpdateHandler(new RuntimeConfig(), silent);
      expect(handler.apply({ interval: 5, enabled: 'true' })).toEqual([]);
    });

    it('should log accepted writes with old and new values and rejected fields as warnings', () => {
      const logger = pino({ level: 'silent' });
      const info = vi.spyOn(logger, 'info');
      const warn = vi.spyOn(logger, 'warn');
      const handler = new AttributeUpdateHandler(new RuntimeConfig(), logger);

      handler.apply({ interval: 9, enabled: 'perhaps' });

      expect(info).toHaveBeenCalledWith({ key: 'interval', previous: 5, next: 9 }, 'updated interval');
      expect(warn).toHaveBeenCalledWith(
        { key: 'enabled', value: 'perhaps', reason: 'expected a boolean' },
        'rejected enabled update, keeping previous value',
      );
    });

    it('should keep the previous interval when an update exceeds the ceiling', () => {
      const logger = pino({ level: 'silent' });
      const warn = vi.spyOn(logger, 'warn');
      const config = new RuntimeConfig();
      const handler = new AttributeUpdateHandler(config, logger);

      expect(handler.handleMessage(topic, JSON.stringify({ interval: 3000000 }))).toEqual([]);

      expect(config.interval).toBe(5);
      expect(warn).toHaveBeenCalledWith(
        { key: 'interval', value: 3000000, reason: 'expected an integer from 1 to 2147483' },
        'rejected interval update, keeping previous value',
      );
    });

    it('should simulate an OTA update when the firmware version changes', () => {
      const logger = pino({ level: 'silent' });
      const info = vi.spyOn(logger, 'info');
      const handler = new AttributeUpdateHandler(new RuntimeConfig(), logger);

      handler.apply({ firmware_version: 2 });

      expect(info).toHaveBeenCalledWith({ firmwareVersion: '2' }, 'simulating OTA update to firmware v2');
      expect(info).toHaveBeenCalledWith('OTA simulation completed');
    });
  });
});
