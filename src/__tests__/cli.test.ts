import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../cli.js';

describe('parseCliArgs', () => {
  it('should default to MQTT mode with the standard files', async () => {
    expect(await parseCliArgs([])).toEqual({
      settingsPath: 'settings.yml',
      deviceFile: 'devices.json',
      list: false,
      debug: false,
    });
  });

  it('should read every option', async () => {
    expect(
      await parseCliArgs([
        '--settings',
        '/etc/fusionsolar/settings.yml',
        '--device-file',
        '/var/lib/fusionsolar/devices.json',
        '--list',
        '--debug',
      ])
    ).toEqual({
      settingsPath: '/etc/fusionsolar/settings.yml',
      deviceFile: '/var/lib/fusionsolar/devices.json',
      list: true,
      debug: true,
    });
  });
});
