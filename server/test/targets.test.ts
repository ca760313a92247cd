import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { ConfigError } from '../src/errors';
import {
  enabledTargets,
  findTarget,
  loadMonitorConfig,
  parseMonitorConfig
} from '../src/targets';

describe('targets', () => {
  it('applies target and alert defaults', () => {
    const { config, issues } = parseMonitorConfig({
      targets: [{ name: 'svc-a', url: 'https://svc-a.example.test' }]
    });

    expect(issues).toEqual([]);
    expect(config.targets).toEqual([
      {
        name: 'svc-a',
        url: 'https://svc-a.example.test',
        method: 'GET',
        expectedStatus: 200,
        timeoutMs: 10000,
        contains: null,
        enabled: true,
        alertChannels: ['chat'],
        escalateAfter: {}
      }
    ]);
    expect(config.alerts).toEqual({
      firstAlertChannel: 'chat',
      chat: { enabled: true, escalateAfter: 1 },
      email: { enabled: true, escalateAfter: 3, recipients: [] },
      sms: {
        enabled: false,
        escalateAfter: 5,
        method: 'email_gateway',
        gateway: null,
        recipients: []
      }
    });
  });

  it('normalizes method case, dedupes channels and keeps their order', () => {
    const { config } = parseMonitorConfig({
      targets: [
        {
          name: 'svc-a',
          url: 'http://svc-a.example.test',
          method: 'head',
          alert_channels: ['email', 'chat', 'email'],
          escalate_after: { email: 2, sms: 4 }
        }
      ]
    });

    const target = config.targets[0];
    expect(target?.method).toBe('HEAD');
    expect(target?.alertChannels).toEqual(['email', 'chat']);
    expect(target?.escalateAfter).toEqual({ email: 2, sms: 4 });
  });

  it('skips malformed and duplicate targets but keeps the rest', () => {
    const { config, issues } = parseMonitorConfig({
      targets: [
        { name: 'svc-a', url: 'https://svc-a.example.test' },
        { name: 'bad-url', url: 'ftp://files.example.test' },
        { name: 'svc-a', url: 'https://other.example.test' },
        { url: 'https://nameless.example.test' },
        { name: 'bad-channel', url: 'https://svc-b.example.test', alert_channels: ['pager'] }
      ]
    });

    expect(config.targets.map((target) => target.name)).toEqual(['svc-a']);
    expect(issues.map((issue) => [issue.index, issue.name])).toEqual([
      [1, 'bad-url'],
      [2, 'svc-a'],
      [3, null],
      [4, 'bad-channel']
    ]);
    expect(issues.every((issue) => issue.error instanceof ConfigError)).toBe(true);
    expect(issues[1]?.error.message).toBe("target #2 skipped (duplicate name 'svc-a')");
  });

  it('throws when no target can be loaded', () => {
    expect(() => parseMonitorConfig({ targets: [{ name: 'x', url: 'nope' }] })).toThrow(
      'no loadable targets in monitor config'
    );
    expect(() => parseMonitorConfig({ alerts: {} })).toThrow(ConfigError);
  });

  it('returns a deeply frozen config', () => {
    const { config } = parseMonitorConfig({
      targets: [{ name: 'svc-a', url: 'https://svc-a.example.test' }]
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.targets)).toBe(true);
    expect(Object.isFrozen(config.targets[0]?.alertChannels)).toBe(true);
    expect(Object.isFrozen(config.alerts.email.recipients)).toBe(true);
  });

  it('filters enabled targets and finds by name', () => {
    const { config } = parseMonitorConfig({
      targets: [
        { name: 'svc-a', url: 'https://svc-a.example.test' },
        { name: 'svc-b', url: 'https://svc-b.example.test', enabled: false }
      ]
    });

    expect(enabledTargets(config).map((target) => target.name)).toEqual(['svc-a']);
    expect(findTarget(config, 'svc-b')?.enabled).toBe(false);
    expect(findTarget(config, 'svc-c')).toBeNull();
  });

  describe('loadMonitorConfig', () => {
    let dir = '';

    beforeAll(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'watchpost-targets-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reads a config file from disk', async () => {
      const file = path.join(dir, 'targets.json');
      await writeFile(
        file,
        JSON.stringify({ targets: [{ name: 'svc-a', url: 'https://svc-a.example.test' }] })
      );

      const { config } = await loadMonitorConfig(file);

      expect(config.targets).toHaveLength(1);
    });

    it('wraps invalid JSON and missing files in ConfigError', async () => {
      const file = path.join(dir, 'broken.json');
      await writeFile(file, '{ "targets": [');

      await expect(loadMonitorConfig(file)).rejects.toBeInstanceOf(ConfigError);
      await expect(loadMonitorConfig(path.join(dir, 'missing.json'))).rejects.toThrow(
        /cannot read monitor config/
      );
    });
  });
});
