/**
 * Sensor Service
 * ---------------------------------------------
 * Purpose
 * - Simulate a temperature/humidity device that reports telemetry to a
 *   ThingsBoard-compatible MQTT broker.
 *
 * Responsibilities
 * - Keep a broker session alive, reconnecting with exponential backoff.
 * - On every (re)connect: subscribe to shared attribute updates, then request
 *   the current shared attributes.
 * - Apply `interval`, `enabled` and `firmware_version` updates at runtime.
 * - Publish `{temperature, humidity}` every `interval` seconds while enabled.
 *
 * Topic Contracts
 * - Telemetry out: `v1/devices/me/telemetry`
 * - Attribute updates in / client attributes out: `v1/devices/me/attributes`
 * - Snapshot request: `v1/devices/me/attributes/request/{id}`
 *   -> Response: `v1/devices/me/attributes/response/{id}`
 *
 * Environment
 * - MQTT_URL, DEVICE_ACCESS_TOKEN (required), DEVICE_NAME, MQTT_TLS_*.
 * - RECONNECT_*, DISABLED_POLL_MS, SHUTDOWN_GRACE_MS, LOG_LEVEL, LOG_FILE.
 */
import 'dotenv/config';
import { SensorAgent } from './agent.js';
import { SERVICE, loadConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { MqttTransport } from './mqtt.js';
import { registerShutdown } from './shutdown.js';

function main(): void {
  const config = loadConfig();
  const logger = createLogger(SERVICE, config.log);
  logger.info(
    `MQTT config: url=${config.mqttUrl} device=${config.deviceName} ca=${config.tls.ca || 'unset'} cert=${config.tls.cert || 'unset'} key=${config.tls.key || 'unset'} rejectUnauthorized=${config.tls.rejectUnauthorized}`,
  );

  const transport = new MqttTransport(config, logger.child({ component: 'mqtt' }));
  const agent = new SensorAgent({
    transport,
    logger,
    backoff: config.backoff,
    disabledPollMs: config.disabledPollMs,
  });

  registerShutdown(agent, logger, config.shutdownGraceMs);
  agent.start();
}

try {
  main();
} catch (e) {
  const kind = e instanceof ConfigurationError ? 'invalid configuration' : 'startup failed';
  console.error(`[${SERVICE}] ${kind}: ${errorMessage(e)}`);
  process.exitCode = 1;
}
