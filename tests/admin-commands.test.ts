// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi } from 'vitest';
import { AdminApiClient } from '../src/api/admin-client.js';
import type { FetchLike } from '../src/api/transport.js';
import { AdminCommands } from '../src/commands/admin-commands.js';
import type { CommandOutput } from '../src/commands/output/index.js';
import { emptyResponse, hangingFetch, jsonResponse, queuedFetch } from './helpers/fake-fetch.js';

function setup(fetch: FetchLike, confirm: (message: string) => Promise<boolean> = async () => true) {
  const outputs: CommandOutput[] = [];
  const confirmer = vi.fn(confirm);
  const commands = new AdminCommands(AdminApiClient.create({ baseUrl: 'http://admin.test', fetch }), {
    emit: (output) => outputs.push(output),
    confirm: confirmer,
  });
  return { commands, outputs, confirmer };
}

const refused = () =>
  vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') }));

describe('AdminCommands', () => {
  it('returns and emits the created user', async () => {
    const created = { user_id: 'u-1', email: 'ada@example.com', name: 'Ada', token: 'tok', expires_at: '2024-06-02' };
    const { commands, outputs } = setup(queuedFetch(jsonResponse(created)));

    expect(await commands.createUser('ada@example.com', 'Ada')).toEqual(created);
    expect(outputs).toEqual([{ type: 'user', action: 'created', user: created }]);
  });

  it('refuses blank required fields without a request', async () => {
    const fetch = queuedFetch();
    const { commands, outputs } = setup(fetch);

    expect(await commands.createUser('  ', 'Ada')).toBeNull();
    expect(outputs).toEqual([{ type: 'usage', message: 'Please provide an email.' }]);
    expect(fetch).not.toHaveBeenCalled();
  });

  describe('not found', () => {
    it.each([
      ['getUser', (c: AdminCommands) => c.getUser('9')],
      ['refreshToken', (c: AdminCommands) => c.refreshToken('9')],
      ['showHistory', (c: AdminCommands) => c.showHistory('9')],
      ['addQa', (c: AdminCommands) => c.addQa('9', 'q', 'a')],
    ])('%s renders not found and returns null', async (_name, call) => {
      const { commands, outputs } = setup(queuedFetch(jsonResponse({ detail: 'User not found' }, 404, 'Not Found')));

      await expect(call(commands)).resolves.toBeNull();
      expect(outputs).toEqual([{ type: 'user', action: 'not_found', by: 'id', key: '9' }]);
    });

    it('getUserByEmail reports the email', async () => {
      const { commands, outputs } = setup(queuedFetch(emptyResponse(404, 'Not Found')));
      expect(await commands.getUserByEmail('x@example.com')).toBeNull();
      expect(outputs).toEqual([{ type: 'user', action: 'not_found', by: 'email', key: 'x@example.com' }]);
    });

    it('deleteUser renders not found and returns false', async () => {
      const { commands, outputs } = setup(queuedFetch(emptyResponse(404, 'Not Found')));
      expect(await commands.deleteUser('9', { confirm: true })).toBe(false);
      expect(outputs).toEqual([{ type: 'user', action: 'not_found', by: 'id', key: '9' }]);
    });
  });

  it('turns a connection failure into an output naming the address', async () => {
    const { commands, outputs } = setup(refused());

    expect(await commands.getUser('7')).toBeNull();
    expect(outputs).toEqual([
      {
        type: 'failure',
        context: 'getting user',
        failure: { type: 'connection', cause: 'connect ECONNREFUSED', baseUrl: 'http://admin.test', service: 'Admin API' },
      },
    ]);
  });

  describe('validateToken', () => {
    it('is true for a valid token', async () => {
      const { commands, outputs } = setup(queuedFetch(jsonResponse({ valid: true, user: { name: 'Ada' } })));
      expect(await commands.validateToken('test-secret')).toBe(true);
      expect(outputs[0]).toMatchObject({ type: 'user', action: 'token_valid' });
    });

    it('is false for an invalid token', async () => {
      const { commands, outputs } = setup(queuedFetch(jsonResponse({ valid: false })));
      expect(await commands.validateToken('test-secret')).toBe(false);
      expect(outputs).toEqual([{ type: 'user', action: 'token_invalid' }]);
    });

    it('reads a 404 as invalid or expired', async () => {
      const { commands, outputs } = setup(queuedFetch(emptyResponse(404)));
      expect(await commands.validateToken('test-secret')).toBe(false);
      expect(outputs).toEqual([{ type: 'user', action: 'token_invalid' }]);
    });
  });

  it('returns the new history count', async () => {
    const { commands } = setup(queuedFetch(jsonResponse({ total_history_items: 5 })));
    expect(await commands.addQa('7', 'q', 'a')).toBe(5);
  });

  it('uses the entry count when the history has no total', async () => {
    const entries = [{ question: 'q', answer: 'a', timestamp: null }];
    const { commands, outputs } = setup(queuedFetch(jsonResponse({ history: entries })));

    expect(await commands.showHistory('7')).toEqual(entries);
    expect(outputs).toEqual([{ type: 'user', action: 'history', entries, totalCount: 1 }]);
  });

  describe('deleteUser', () => {
    it('asks for confirmation and sends nothing when declined', async () => {
      const fetch = queuedFetch();
      const { commands, outputs, confirmer } = setup(fetch, async () => false);

      expect(await commands.deleteUser('7')).toBe(false);
      expect(confirmer).toHaveBeenCalledWith('Are you sure you want to delete user 7?');
      expect(outputs).toEqual([{ type: 'user', action: 'cancelled' }]);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('treats Ctrl-C at the prompt as a decline', async () => {
      const fetch = queuedFetch();
      const { commands, outputs } = setup(fetch, async () => {
        throw Object.assign(new Error('User force closed the prompt'), { name: 'ExitPromptError' });
      });

      expect(await commands.deleteUser('7')).toBe(false);
      expect(outputs).toEqual([{ type: 'user', action: 'cancelled' }]);
      expect(fetch).not.toHaveBeenCalled();
    });

    it('passes other prompt errors through', async () => {
      const { commands } = setup(queuedFetch(), async () => {
        throw new Error('stdin is not readable');
      });

      await expect(commands.deleteUser('7')).rejects.toThrow('stdin is not readable');
    });

    it('stays quiet when the request is cancelled', async () => {
      const fetch = hangingFetch();
      const client = AdminApiClient.create({ baseUrl: 'http://admin.test', fetch });
      const outputs: CommandOutput[] = [];
      const commands = new AdminCommands(client, { emit: (output) => outputs.push(output) });

      const pending = commands.deleteUser('7', { confirm: true });
      client.close();

      expect(await pending).toBe(false);
      expect(outputs).toEqual([]);
    });

    it('deletes after confirmation', async () => {
      const fetch = queuedFetch(jsonResponse({ deleted_user: { name: 'Ada', email: 'ada@example.com' } }));
      const { commands, outputs, confirmer } = setup(fetch, async () => true);

      expect(await commands.deleteUser('7')).toBe(true);
      expect(confirmer).toHaveBeenCalledTimes(1);
      expect(outputs).toEqual([{ type: 'user', action: 'deleted', name: 'Ada', email: 'ada@example.com' }]);
    });

    it('skips the prompt with the bypass flag', async () => {
      const fetch = queuedFetch(emptyResponse(200));
      const { commands, confirmer } = setup(fetch);

      expect(await commands.deleteUser('7', { confirm: true })).toBe(true);
      expect(confirmer).not.toHaveBeenCalled();
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  it('reports a 404 from the list endpoint as a failure', async () => {
    const { commands, outputs } = setup(queuedFetch(emptyResponse(404, 'Not Found')));
    expect(await commands.listUsers()).toBeNull();
    expect(outputs).toEqual([
      { type: 'failure', context: 'listing users', failure: { type: 'remote', status: 404, detail: 'Not Found' } },
    ]);
  });
});
