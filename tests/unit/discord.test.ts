import { ButtonBuilder } from 'discord.js';
import { describe, expect, it } from 'vitest';
import { DiscordEmbedBuilder } from '../../src/discord/embed-builder';
import { PaginationManager } from '../../src/discord/pagination';
import { hasAdminAccess } from '../../src/discord/permissions';
import { VpsListView } from '../../src/discord/vps-list-view';
import { VpsRecord } from '../../src/types';

function record(id: number, overrides: Partial<VpsRecord> = {}): VpsRecord {
  return {
    id,
    userId: '111',
    containerName: `user111-basic-${id}`,
    plan: 'basic',
    ramMb: 512,
    cpuCores: 1,
    arch: 'intel',
    status: 'running',
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function buttonState(button: ButtonBuilder): { id?: string; disabled?: boolean } {
  const json = button.toJSON();
  return {
    id: 'custom_id' in json ? json.custom_id : undefined,
    disabled: json.disabled,
  };
}

describe('hasAdminAccess', () => {
  it('lets administrators through regardless of roles', () => {
    expect(hasAdminAccess({ isAdministrator: true, roleIds: [] }, 'YOUR_ADMIN_ROLE_ID_HERE')).toBe(true);
  });

  it('matches the configured admin role', () => {
    expect(hasAdminAccess({ isAdministrator: false, roleIds: ['5', '42'] }, '42')).toBe(true);
    expect(hasAdminAccess({ isAdministrator: false, roleIds: ['5'] }, '42')).toBe(false);
  });

  it('never matches a placeholder role id', () => {
    expect(hasAdminAccess({ isAdministrator: false, roleIds: ['YOUR_ADMIN_ROLE_ID_HERE'] }, 'YOUR_ADMIN_ROLE_ID_HERE')).toBe(false);
    expect(hasAdminAccess({ isAdministrator: false, roleIds: [''] }, '')).toBe(false);
  });
});

describe('PaginationManager', () => {
  const manager = new PaginationManager({ itemsPerPage: 2 });
  const items = [1, 2, 3, 4, 5];

  it('slices the requested page', () => {
    expect(manager.paginate(items, 2)).toEqual({ items: [3, 4], page: 2, totalPages: 3, total: 5 });
  });

  it('clamps out-of-range pages', () => {
    expect(manager.paginate(items, 9).page).toBe(3);
    expect(manager.paginate(items, 0).page).toBe(1);
    expect(manager.paginate(items, -4).items).toEqual([1, 2]);
  });

  it('reports a single empty page for no items', () => {
    expect(manager.paginate([], 1)).toEqual({ items: [], page: 1, totalPages: 1, total: 0 });
  });

  it('encodes target pages in button ids', () => {
    const row = manager.createPaginationButtons('vpslist', '111', 2, 3);

    expect(row.components.map(buttonState)).toEqual([
      { id: 'vpslist:111:1:first', disabled: false },
      { id: 'vpslist:111:1:prev', disabled: false },
      { id: 'vpslist:111:2:info', disabled: true },
      { id: 'vpslist:111:3:next', disabled: false },
      { id: 'vpslist:111:3:last', disabled: false },
    ]);
  });

  it('disables moves past either end', () => {
    const states = manager.createPaginationButtons('vpslist', '111', 1, 1).components.map(buttonState);
    expect(states.map(state => state.disabled)).toEqual([true, true, true, true, true]);
  });

  it('parses button ids back into targets', () => {
    expect(PaginationManager.parseButtonId('vpslist:111:3:next')).toEqual({ prefix: 'vpslist', ownerId: '111', page: 3 });
    expect(PaginationManager.parseButtonId('vpslist:111')).toBeUndefined();
    expect(PaginationManager.parseButtonId('vpslist:111:abc:next')).toBeUndefined();
  });
});

describe('DiscordEmbedBuilder', () => {
  it('formats a plan on one line', () => {
    expect(DiscordEmbedBuilder.formatPlan({ name: 'Small', ram_mb: 1024, cpu: 1, disk_gb: 20, price: 2 }))
      .toBe('1024MB RAM • 1 CPU • 20GB disk • 2 credits');
  });

  it('formats a VPS with its status', () => {
    expect(DiscordEmbedBuilder.formatVpsLine(record(7, { status: 'stopped' })))
      .toBe('🔴 ID 7: `user111-basic-7` — basic — 512MB/1cpu — stopped');
  });

  it('lists plans as fields', () => {
    const embed = DiscordEmbedBuilder.createPlansEmbed([
      ['basic', { name: 'Basic', ram_mb: 512, cpu: 1, disk_gb: 10, price: 1 }],
    ]);
    expect(embed.data.fields).toEqual([
      { name: 'basic — Basic', value: '512MB RAM • 1 CPU • 10GB disk • 1 credits', inline: false },
    ]);
  });

  it('says so when there are no plans', () => {
    expect(DiscordEmbedBuilder.createPlansEmbed([]).data.description).toBe('No plans are configured.');
  });
});

describe('VpsListView', () => {
  it('renders an empty list without buttons', () => {
    const view = new VpsListView(() => []);
    const message = view.render('111');

    expect(message.embeds[0].data.description).toBe('You have no VPS.');
    expect(message.components).toEqual([]);
  });

  it('pages long lists and adds navigation', () => {
    const records = Array.from({ length: 12 }, (_, i) => record(i + 1));
    const view = new VpsListView(() => records, 5);
    const message = view.render('111', 3);

    expect(message.embeds[0].data.description?.split('\n')).toEqual([
      '🟢 ID 11: `user111-basic-11` — basic — 512MB/1cpu — running',
      '🟢 ID 12: `user111-basic-12` — basic — 512MB/1cpu — running',
    ]);
    expect(message.embeds[0].data.footer?.text).toBe('Page 3 of 3 • 12 VPS total');
    expect(message.components).toHaveLength(1);
  });

  it('loads the records of the requested owner', () => {
    const seen: string[] = [];
    const view = new VpsListView(ownerId => {
      seen.push(ownerId);
      return [];
    });
    view.render('222');
    expect(seen).toEqual(['222']);
  });

  it('only claims its own button ids', () => {
    const view = new VpsListView(() => []);
    expect(view.isValidInteraction('vpslist:111:2:next')).toBe(true);
    expect(view.isValidInteraction('other:111:2:next')).toBe(false);
  });
});
