import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createContext } from '../../src/context.js';
import { DEFAULT_CONFIG } from '../../src/config/loader.js';
import { RHELCommands } from '../../src/distro/commands/rhel.js';
import { Terminal } from '../../src/terminal.js';
import { FakeExecutor } from '../helpers/fake-executor.js';

describe('createContext', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'doorbell-ctx-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('detects the host and picks the matching command set', async () => {
    const osRelease = path.join(dir, 'os-release');
    await fs.writeFile(osRelease, 'ID=fedora\nID_LIKE=""\nPRETTY_NAME="Fedora Linux 40"\n');
    const executor = new FakeExecutor()
      .on('command -v', { stdout: '/usr/bin/dnf\n' })
      .on((a) => a[0] === 'id' && a[1] === '-gn', { stdout: 'operators\n' });

    const ctx = await createContext({
      config: DEFAULT_CONFIG,
      executor,
      terminal: new Terminal(() => undefined),
      env: { SUDO_USER: 'pi' },
      osReleasePath: osRelease,
      identity: { username: 'root', uid: 0 },
    });

    expect(ctx.host).toEqual({
      family: 'rhel',
      distroName: 'Fedora Linux 40',
      packageManager: 'dnf',
      currentUser: 'root',
      owner: 'pi',
      ownerGroup: 'operators',
      isRoot: true,
      elevate: true,
    });
    expect(ctx.commands).toBeInstanceOf(RHELCommands);
    expect(ctx.paths.workspace).toBe('/var/silentdoorbell');
    expect(ctx.paths.venvDir).toBe('/var/silentdoorbell/.venv');
  });
});
