import { randomInt } from 'node:crypto';
import mqtt, { type IClientOptions, type MqttClient } from 'mqtt';
import type { MqttConfig } from '../types/config.js';
import type { Snapshot } from '../types/snapshot.js';
import { logDebug, logInfo } from '../utils/logger/index.js';

const COMPONENT = 'MqttService';

export function brokerUrl(config: MqttConfig): string {
  return `${config.protocol}://${config.host}:${config.port}`;
}

export class MqttService {
  constructor(private readonly config: MqttConfig) {}

  private clientOptions(): IClientOptions {
    return {
      clientId: `${this.config.clientId}-${randomInt(0, 1000)}`,
      connectTimeout: this.config.connectTimeout,
      // one connection per run, never re-established
      reconnectPeriod: 0,
      ...(this.config.auth
        ? {
            username: this.config.username ?? undefined,
            password: this.config.password ?? undefined,
          }
        : {}),
    };
  }

  /**
   * Connects, publishes the snapshot as one JSON message under the root
   * topic and disconnects. An unreachable broker, a connection lost while
   * publishing, or no acknowledgement within connectTimeout rejects.
   */
  public async publishSnapshot(snapshot: Snapshot): Promise<void> {
    const url = brokerUrl(this.config);
    const client = await mqtt.connectAsync(url, this.clientOptions(), false);
    logDebug(COMPONENT, `Connected to MQTT broker ${url}`);

    try {
      logDebug(COMPONENT, `Publishing message to topic ${this.config.topic}`);
      await this.publish(client, JSON.stringify(snapshot));
      logInfo(COMPONENT, 'Message published', { topic: this.config.topic });
    } finally {
      await client.endAsync(true);
    }
  }

  private publish(client: MqttClient, payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        fail(
          new Error(
            `Publishing to ${this.config.topic} timed out after ${this.config.connectTimeout} ms`
          )
        );
      }, this.config.connectTimeout);

      const onClose = () => {
        fail(new Error('MQTT connection closed before the message was published'));
      };
      const onError = (error: Error) => {
        fail(error);
      };

      const cleanup = () => {
        clearTimeout(timeout);
        client.off('close', onClose);
        client.off('error', onError);
      };
      const fail = (error: unknown) => {
        cleanup();
        reject(error);
      };

      client.once('close', onClose);
      client.once('error', onError);

      client
        .publishAsync(this.config.topic, payload, {
          qos: this.config.qos,
          retain: this.config.retain,
        })
        .then(() => {
          cleanup();
          resolve();
        }, fail);
    });
  }
}
