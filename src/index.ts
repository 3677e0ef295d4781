#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { parseCliArgs } from './cli.js';
import { readConfig } from './services/config.js';
import { FusionSolarClient } from './services/fusionsolar/client.js';
import { loadInventory } from './services/inventory.js';
import { formatListing } from './services/listing.js';
import { MqttService } from './services/mqtt.js';
import { fetchRealtimeData } from './services/realtime.js';
import { flattenCollections } from './services/snapshot.js';
import { logError, logInfo, setLogLevel } from './utils/logger/index.js';

const COMPONENT = 'Main';

async function main() {
  try {
    const options = await parseCliArgs(hideBin(process.argv));
    const config = await readConfig(options.settingsPath);
    setLogLevel(options.debug ? 'debug' : config.system.logLevel, options.debug);

    const collections = await FusionSolarClient.withSession(
      config.fusionsolar,
      async (client) => {
        const plants = await loadInventory(client, options.deviceFile);
        return fetchRealtimeData(client, plants);
      }
    );
    const snapshot = flattenCollections(collections);

    logInfo(
      COMPONENT,
      `Collected ${collections.plants.length} plants and ${collections.devices.length} devices`
    );

    if (options.list) {
      logInfo(COMPONENT, 'List of variables reported to MQTT');
      process.stdout.write(`${formatListing(config.mqtt.topic, snapshot)}\n`);
      return;
    }

    await new MqttService(config.mqtt).publishSnapshot(snapshot);
  } catch (error) {
    logError(COMPONENT, 'Run failed', error);
    process.exit(1);
  }
}

void main();
