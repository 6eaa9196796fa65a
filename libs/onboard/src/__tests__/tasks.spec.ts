import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { initLogging } from '@modegreet/core';
import { ExecutionChannel } from '../execution';
import { runReview, runUpdate, runUserCreation } from '../tasks';
import { FakeOnboardService } from './fake-service';

const USER = { username: 'alice', password: 'test-secret', groups: ['wheel'], shell: '/bin/bash' };

describe('runUserCreation', () => {
  it('reports success', async () => {
    const service = new FakeOnboardService();
    const channel = new ExecutionChannel();

    await runUserCreation(service, channel, USER);

    expect(service.calls).toEqual(['createUser alice wheel /bin/bash']);
    expect(channel.drain()).toEqual([
      { type: 'task-started', index: 0 },
      { type: 'task-succeeded', index: 0 },
      { type: 'user-created', username: 'alice' },
      { type: 'step-complete', result: 'completed' },
    ]);
  });

  it('reports failure with the error text', async () => {
    const service = new FakeOnboardService();
    service.failures.set('createUser', 'useradd failed with code 9');
    const channel = new ExecutionChannel();

    await runUserCreation(service, channel, USER);

    expect(channel.drain()).toEqual([
      { type: 'task-started', index: 0 },
      { type: 'task-failed', index: 0, error: 'useradd failed with code 9' },
      { type: 'user-created', username: null },
      { type: 'step-complete', result: 'failed' },
    ]);
  });
});

describe('runReview', () => {
  it('creates the user and applies each selected setting in order', async () => {
    const service = new FakeOnboardService();
    const channel = new ExecutionChannel();

    await runReview(service, channel, { ...USER, locale: 'de_DE.UTF-8', timezone: 'UTC', alreadyCreated: false });

    expect(service.calls).toEqual(['createUser alice wheel /bin/bash', 'setLocale de_DE.UTF-8', 'setTimezone UTC']);
    expect(channel.drain()).toEqual([
      { type: 'task-started', index: 0 },
      { type: 'task-succeeded', index: 0 },
      { type: 'user-created', username: 'alice' },
      { type: 'task-started', index: 1 },
      { type: 'task-succeeded', index: 1 },
      { type: 'task-started', index: 2 },
      { type: 'task-succeeded', index: 2 },
      { type: 'review-complete', anyFailed: false },
    ]);
  });

  it('does not create an account twice', async () => {
    const service = new FakeOnboardService();
    const channel = new ExecutionChannel();

    await runReview(service, channel, { ...USER, alreadyCreated: true });

    expect(service.calls).toEqual([]);
    expect(channel.drain()).toEqual([
      { type: 'task-started', index: 0 },
      { type: 'task-succeeded', index: 0, output: 'Already created' },
      { type: 'review-complete', anyFailed: false },
    ]);
  });

  it('stops when the account cannot be created', async () => {
    const service = new FakeOnboardService();
    service.failures.set('createUser', 'useradd failed with code 9');
    const channel = new ExecutionChannel();

    await runReview(service, channel, { ...USER, locale: 'de_DE.UTF-8', alreadyCreated: false });

    expect(service.calls).toEqual(['createUser alice wheel /bin/bash']);
    expect(channel.drain().slice(-2)).toEqual([
      { type: 'user-created', username: null },
      { type: 'review-complete', anyFailed: true },
    ]);
  });

  it('continues past a failed setting', async () => {
    const service = new FakeOnboardService();
    service.failures.set('setKeymap', 'localectl set-keymap failed with code 1');
    const channel = new ExecutionChannel();

    await runReview(service, channel, { ...USER, keymap: 'xx', timezone: 'UTC', alreadyCreated: true });

    expect(service.calls).toEqual(['setKeymap xx', 'setTimezone UTC']);
    expect(channel.drain().slice(2)).toEqual([
      { type: 'task-started', index: 1 },
      { type: 'task-failed', index: 1, error: 'localectl set-keymap failed with code 1' },
      { type: 'task-started', index: 2 },
      { type: 'task-succeeded', index: 2 },
      { type: 'review-complete', anyFailed: true },
    ]);
  });
});

describe('runUpdate', () => {
  it('runs every command in order and routes sudo commands through sudo', async () => {
    const service = new FakeOnboardService();
    const channel = new ExecutionChannel();

    await runUpdate(service, channel, {
      username: 'alice',
      sudoPassword: 'test-secret',
      commands: [
        { name: 'Install git', command: ['pacman', '-S', 'git'], sudo: true },
        { name: 'Install editor', command: ['flatpak', 'install', 'editor'], sudo: false },
      ],
    });

    expect(service.calls).toEqual(['runSudoAsUser alice pacman -S git (11)', 'runAsUser alice flatpak install editor']);
    expect(channel.drain()).toEqual([
      { type: 'task-started', index: 0 },
      { type: 'task-succeeded', index: 0, output: undefined },
      { type: 'task-started', index: 1 },
      { type: 'task-succeeded', index: 1, output: 'ran flatpak install editor' },
      { type: 'update-complete', anyFailed: false },
    ]);
  });

  it('records failures and keeps going', async () => {
    const service = new FakeOnboardService();
    service.failures.set('runAsUser:flatpak', 'Command failed: no remote');
    const channel = new ExecutionChannel();

    await runUpdate(service, channel, {
      username: 'alice',
      sudoPassword: '',
      commands: [
        { name: 'Install editor', command: ['flatpak', 'install', 'editor'], sudo: false },
        { name: 'Configure', command: ['setup'], sudo: false },
      ],
    });

    const messages = channel.drain();
    expect(messages[1]).toEqual({ type: 'task-failed', index: 0, error: 'Command failed: no remote' });
    expect(messages[3]).toEqual({ type: 'task-succeeded', index: 1, output: 'ran setup' });
    expect(messages[4]).toEqual({ type: 'update-complete', anyFailed: true });
  });

  describe('logging', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'modegreet-tasks-'));
    });

    afterEach(() => {
      initLogging();
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes failures to the logger installed after import', async () => {
      const logFile = path.join(dir, 'onboard.log');
      initLogging({ logFile, level: 'info' });
      const service = new FakeOnboardService();
      service.failures.set('runAsUser:flatpak', 'Command failed: no remote');

      await runUpdate(service, new ExecutionChannel(), {
        username: 'alice',
        sudoPassword: '',
        commands: [{ name: 'Install editor', command: ['flatpak', 'install', 'editor'], sudo: false }],
      });

      const lines = fs.readFileSync(logFile, 'utf8').trim().split('\n');
      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({ scope: 'tasks', command: 'Install editor', msg: 'Package command failed' });
    });
  });
});
