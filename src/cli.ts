import yargs from 'yargs';

export interface CliOptions {
  settingsPath: string;
  deviceFile: string;
  list: boolean;
  debug: boolean;
}

export async function parseCliArgs(argv: string[]): Promise<CliOptions> {
  const args = await yargs(argv)
    .scriptName('fusionsolar-mqtt')
    .usage('Request data from FusionSolar and publish it to MQTT')
    .option('settings', {
      type: 'string',
      default: 'settings.yml',
      describe: 'Settings file in YAML format',
    })
    .option('device-file', {
      type: 'string',
      default: 'devices.json',
      describe: 'Plants and devices retrieved from FusionSolar',
    })
    .option('list', {
      type: 'boolean',
      default: false,
      describe: 'List the values that would be published and exit',
    })
    .option('debug', {
      type: 'boolean',
      default: false,
      describe: 'Enable debug messages',
    })
    .strict()
    .help()
    .parseAsync();

  return {
    settingsPath: args.settings,
    deviceFile: args['device-file'],
    list: args.list,
    debug: args.debug,
  };
}
