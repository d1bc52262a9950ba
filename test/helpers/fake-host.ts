import fs from 'fs/promises';
import path from 'path';
import { FakeExecutor } from './fake-executor.js';

export interface FakeHostState {
  installed: Set<string>;
  groups: Set<string>;
  busEnabled: boolean;
  raspiConfig: boolean;
  serviceActive: boolean;
  /** Files a clone writes into the workspace. */
  repo: Record<string, string>;
  /** Files a pull writes into the workspace. */
  upstream: Record<string, string>;
  /** Tracked files at HEAD of the checkout; a clone or pull updates it. */
  head: Record<string, string>;
}

export const DEFAULT_REPO: Record<string, string> = {
  'device.service': '[Unit]\nDescription=Doorbell\n\n[Service]\nExecStart=/var/silentdoorbell/.venv/bin/python device_boot.py\n',
  'device_boot.py': 'print("ring")\n',
  'requirements.txt': 'requests==2.32.3\nRPi.GPIO\n',
  'settings.txt': '{"device_type_id": 1, "version": "0.1"}\n',
};

/**
 * A stateful stand-in for a Raspberry Pi: package database, group database,
 * raspi-config, git and systemd, with filesystem effects applied to real
 * temp directories so a second run observes what the first one did.
 */
export class FakeHost {
  readonly executor = new FakeExecutor();
  readonly state: FakeHostState;

  constructor(state: Partial<FakeHostState> = {}) {
    this.state = {
      installed: new Set<string>(),
      groups: new Set(['pi', 'sudo']),
      busEnabled: false,
      raspiConfig: true,
      serviceActive: true,
      repo: DEFAULT_REPO,
      upstream: {},
      head: {},
      ...state,
    };
    const s = this.state;
    const ex = this.executor;

    ex.on('command -v', { stdout: '/usr/bin/found\n' });
    ex.on('command -v raspi-config', () => (s.raspiConfig ? { stdout: '/usr/bin/raspi-config\n' } : { exitCode: 1 }));

    ex.on((a) => a[0] === 'dpkg-query', (a) => {
      const pkg = a[a.length - 1];
      return s.installed.has(pkg)
        ? { stdout: 'install ok installed' }
        : { exitCode: 1, stderr: `dpkg-query: no packages found matching ${pkg}\n` };
    });
    ex.on((a) => a[0] === 'apt-get' && a[1] === 'install', (a) => {
      for (const pkg of a.slice(3)) s.installed.add(pkg);
      return { stdout: 'Setting up...\n' };
    });

    ex.on((a) => a[0] === 'raspi-config' && a[2] === 'get_i2c', () => ({ stdout: s.busEnabled ? '0\n' : '1\n' }));
    ex.on((a) => a[0] === 'raspi-config' && a[2] === 'do_i2c', () => {
      s.busEnabled = true;
      return {};
    });

    ex.on((a) => a[0] === 'id' && a[1] === '-gn', { stdout: 'pi\n' });
    ex.on((a) => a[0] === 'id' && a[1] === '-nG', () => ({ stdout: `${[...s.groups].join(' ')}\n` }));
    ex.on((a) => a[0] === 'usermod', (a) => {
      s.groups.add(a[2]);
      return {};
    });

    ex.on((a) => a[0] === 'mkdir', async (a) => {
      await fs.mkdir(a[2], { recursive: true });
      return {};
    });
    ex.on((a) => a[0] === 'tee', async (a, cmd) => {
      const append = a[1] === '-a';
      const file = append ? a[2] : a[1];
      await (append ? fs.appendFile(file, cmd.stdin ?? '') : fs.writeFile(file, cmd.stdin ?? ''));
      return { stdout: cmd.stdin ?? '' };
    });
    ex.on((a) => a[0] === 'cp', async (a) => {
      await fs.copyFile(a[1], a[2]);
      return {};
    });

    ex.on((a) => a[0] === 'git' && a[1] === 'clone', async (a) => {
      const dir = a[a.length - 1];
      await fs.mkdir(path.join(dir, '.git'), { recursive: true });
      await writeFiles(dir, s.repo);
      s.head = { ...s.repo };
      return { stderr: `Cloning into '${dir}'...\n` };
    });
    ex.on((a) => a[0] === 'git' && a[3] === 'ls-files', (a) => (a[5] in s.head ? { stdout: `${a[5]}\n` } : { exitCode: 1 }));
    ex.on((a) => a[0] === 'git' && a[3] === 'checkout', async (a) => {
      const file = a[5];
      if (!(file in s.head)) return { exitCode: 1, stderr: `error: pathspec '${file}' did not match any file(s) known to git\n` };
      await fs.writeFile(path.join(a[2], file), s.head[file]);
      return {};
    });
    // Like git, refuse to merge over local edits to a file the pull would change.
    ex.on((a) => a[0] === 'git' && a[3] === 'pull', async (a) => {
      const dir = a[2];
      const blocked: string[] = [];
      for (const [name, content] of Object.entries(s.upstream)) {
        const local = await fs.readFile(path.join(dir, name), 'utf-8').catch(() => null);
        const expected = name in s.head ? s.head[name] : content;
        if (local !== null && local !== expected) blocked.push(name);
      }
      if (blocked.length > 0) {
        return {
          exitCode: 1,
          stderr: `error: Your local changes to the following files would be overwritten by merge:\n\t${blocked.join('\n\t')}\nPlease commit your changes or stash them before you merge.\nAborting\n`,
        };
      }
      await writeFiles(dir, s.upstream);
      s.head = { ...s.head, ...s.upstream };
      return { stdout: Object.keys(s.upstream).length ? 'Fast-forward\n' : 'Already up to date.\n' };
    });

    ex.on((a) => a[0] === 'python3' && a[2] === 'venv', async (a) => {
      await fs.mkdir(path.join(a[3], 'bin'), { recursive: true });
      await fs.writeFile(path.join(a[3], 'bin', 'python'), '');
      return {};
    });

    ex.on((a) => a[0] === 'systemctl' && a[1] === 'is-active', () =>
      s.serviceActive ? { stdout: 'active\n' } : { exitCode: 3, stdout: 'failed\n' });
  }
}

async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content);
  }
}
