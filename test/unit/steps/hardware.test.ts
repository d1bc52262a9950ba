import fs from 'fs/promises';
import path from 'path';
import { configureHardware } from '../../../src/steps/hardware.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import { FakeHost } from '../../helpers/fake-host.js';
import { BOOT_CONFIG_HEADER, makeContext, makeTempRoot, testConfig } from '../../helpers/context.js';

const LINE = 'dtparam=i2c_arm_baudrate=10000';

describe('configureHardware', () => {
  let root: string;
  let bootConfig: string;

  beforeEach(async () => {
    root = await makeTempRoot();
    bootConfig = path.join(root, 'boot', 'config.txt');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('enables the bus, appends the tuning line and adds the group on a bare host', async () => {
    const host = new FakeHost();
    const { ctx, output } = makeContext(root, host.executor);

    const result = await configureHardware(ctx);

    expect(result).toEqual({
      rebootRequired: true,
      changes: ['bus_enabled', 'boot_config_line_added', 'group_membership_added'],
    });
    expect(await fs.readFile(bootConfig, 'utf-8')).toBe(`${BOOT_CONFIG_HEADER}${LINE}\n`);
    expect(host.state.busEnabled).toBe(true);
    expect(host.state.groups.has('i2c')).toBe(true);
    expect(host.executor.lines).toEqual([
      'bash -c command -v raspi-config',
      'raspi-config nonint get_i2c',
      'raspi-config nonint do_i2c 0',
      `tee -a ${bootConfig}`,
      'id -nG pi',
      'usermod -aG i2c pi',
    ]);
    expect(output).toEqual([
      '🔧 Enabling I2C...',
      `🔧 Adding '${LINE}' to ${bootConfig}...`,
      '🔧 Adding pi to the i2c group...',
    ]);
  });

  it('changes nothing on a configured host', async () => {
    await fs.writeFile(bootConfig, `${BOOT_CONFIG_HEADER}${LINE}\n`);
    const host = new FakeHost({ busEnabled: true, groups: new Set(['pi', 'i2c']) });
    const { ctx, output } = makeContext(root, host.executor);

    const result = await configureHardware(ctx);

    expect(result).toEqual({ rebootRequired: false, changes: [] });
    expect(await fs.readFile(bootConfig, 'utf-8')).toBe(`${BOOT_CONFIG_HEADER}${LINE}\n`);
    expect(host.executor.ran('do_i2c')).toBe(false);
    expect(host.executor.ran('tee')).toBe(false);
    expect(host.executor.ran('usermod')).toBe(false);
    expect(output).toEqual(['✅ Hardware already configured.']);
  });

  it('starts the appended line on its own line when the file lacks a trailing newline', async () => {
    await fs.writeFile(bootConfig, '[all]');
    const host = new FakeHost({ busEnabled: true, groups: new Set(['i2c']) });
    const { ctx } = makeContext(root, host.executor);

    const result = await configureHardware(ctx);

    expect(result.changes).toEqual(['boot_config_line_added']);
    expect(await fs.readFile(bootConfig, 'utf-8')).toBe(`[all]\n${LINE}\n`);
  });

  it('creates the boot config when it does not exist', async () => {
    await fs.rm(bootConfig);
    const host = new FakeHost({ busEnabled: true, groups: new Set(['i2c']) });
    const { ctx } = makeContext(root, host.executor);

    await configureHardware(ctx);

    expect(await fs.readFile(bootConfig, 'utf-8')).toBe(`${LINE}\n`);
  });

  it('skips the bus toggle without raspi-config but still applies the rest', async () => {
    const host = new FakeHost({ raspiConfig: false });
    const { ctx, output } = makeContext(root, host.executor);

    const result = await configureHardware(ctx);

    expect(result.changes).toEqual(['boot_config_line_added', 'group_membership_added']);
    expect(host.executor.ran('raspi-config nonint')).toBe(false);
    expect(output[0]).toBe('⚠️ raspi-config not found; enable I2C manually if this is a Raspberry Pi.');
  });

  it('uses the spi functions and group when configured for SPI', async () => {
    const host = new FakeHost({ groups: new Set(['spi']) });
    host.executor.on('get_spi', { stdout: '1\n' });
    const config = testConfig(root);
    const { ctx } = makeContext(root, host.executor, {
      config: { ...config, hardware: { ...config.hardware, bus: 'spi', group: 'spi', boot_config_line: 'dtparam=spi=on' } },
    });

    const result = await configureHardware(ctx);

    expect(result.changes).toEqual(['bus_enabled', 'boot_config_line_added']);
    expect(host.executor.lines).toContain('raspi-config nonint do_spi 0');
  });

  it('does nothing when hardware configuration is disabled', async () => {
    const host = new FakeHost();
    const config = testConfig(root);
    const { ctx, output } = makeContext(root, host.executor, {
      config: { ...config, hardware: { ...DEFAULT_CONFIG.hardware, enabled: false } },
    });

    expect(await configureHardware(ctx)).toEqual({ rebootRequired: false, changes: [] });
    expect(host.executor.calls).toEqual([]);
    expect(output).toEqual(['ℹ️ Hardware configuration disabled, skipping.']);
  });
});
