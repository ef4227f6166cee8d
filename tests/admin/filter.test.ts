import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { CapabilityTreeCache } from '../../src/admin/options.js';
import {
  collectOptionValues,
  filterOptions,
  getAdminActionOptionsBySubject,
} from '../../src/admin/filter.js';
import { loadAdminSite } from '../../src/admin/static-site.js';
import type { CapabilityOption } from '../../src/admin/types.js';
import { MemoryRuleStore } from '../helpers/memory-store.js';

const SITE_PATH = fileURLToPath(new URL('../fixtures/site.json', import.meta.url));

function siteOptions(): CapabilityOption[] {
  return new CapabilityTreeCache().get(loadAdminSite(SITE_PATH));
}

/**
 * 权限树过滤单元测试。
 */
describe('Option filtering', () => {
  describe('filterOptions', () => {
    it('should only remove nodes and keep sibling order', () => {
      const options = siteOptions();
      const result = filterOptions(options, (o) => o.value !== 'feedback#admin:page#page');
      expect(result.map((o) => o.label)).toEqual(['Users', 'System', 'Dashboard']);
      expect(result[0].children?.map((o) => o.label)).toEqual(['List', 'Filter', 'Create', 'Delete']);
    });

    it('should not mutate the input tree', () => {
      const options = siteOptions();
      const result = filterOptions(options, (o) => o.value !== 'users#admin:delete#page');

      expect(result[0]).not.toBe(options[0]);
      expect(result[0].children).toHaveLength(3);
      expect(options[0].children).toHaveLength(4);

      result[0].children?.push({ label: 'Extra', value: 'users#admin:extra#page' });
      result[0].label = 'Changed';
      expect(options[0].children).toHaveLength(4);
      expect(options[0].label).toBe('Users');
    });

    it('should keep only the authorized page of a group', () => {
      const allowed = new Set(['system#admin:page#page', 'logs#admin:page#page']);
      const result = filterOptions(siteOptions(), (o) => allowed.has(o.value));
      expect(result).toEqual([
        {
          label: 'System',
          value: 'system#admin:page#page',
          sort: 1,
          children: [{ label: 'Logs', value: 'logs#admin:page#page', sort: 3 }],
        },
      ]);
    });

    it('should keep a passing group whose children were all removed', () => {
      const result = filterOptions(siteOptions(), (o) => o.value === 'system#admin:page#page');
      expect(result).toEqual([
        { label: 'System', value: 'system#admin:page#page', sort: 1, children: [] },
      ]);
    });

    it('should drop a group whose own predicate fails', () => {
      const result = filterOptions(siteOptions(), (o) => o.value === 'logs#admin:page#page');
      expect(result).toEqual([]);
    });
  });

  describe('collectOptionValues', () => {
    it('should collect every value in pre-order', () => {
      expect([...collectOptionValues(siteOptions())]).toEqual([
        'users#admin:page#page',
        'users#admin:list#page',
        'users#admin:filter#page',
        'users#admin:create#page',
        'users#admin:delete#page',
        'feedback#admin:page#page',
        'feedback#admin:submit#page',
        'system#admin:page#page',
        'logs#admin:page#page',
        'settings#admin:page#page',
        'settings#admin:submit#page',
        'dashboard#admin:page#page',
      ]);
    });
  });

  describe('getAdminActionOptionsBySubject', () => {
    it('should keep only options the subject is allowed to access', async () => {
      const store = new MemoryRuleStore([
        ['u:alice', 'users', 'admin:page', 'page', 'allow'],
        ['u:alice', 'users', 'admin:list', 'page', 'allow'],
        ['u:alice', 'system', 'admin:page', 'page', 'allow'],
        ['u:alice', 'logs', 'admin:page', 'page', 'allow'],
      ]);
      const cache = new CapabilityTreeCache();
      const result = await getAdminActionOptionsBySubject(store, 'u:alice', loadAdminSite(SITE_PATH), { cache });

      expect(result).toEqual([
        {
          label: 'Users',
          value: 'users#admin:page#page',
          sort: 10,
          children: [{ label: 'List', value: 'users#admin:list#page' }],
        },
        {
          label: 'System',
          value: 'system#admin:page#page',
          sort: 1,
          children: [{ label: 'Logs', value: 'logs#admin:page#page', sort: 3 }],
        },
      ]);
      expect(store.calls.filter((name) => name === 'enforce')).toHaveLength(12);
    });

    it('should honour permissions inherited through roles and deny rules', async () => {
      const store = new MemoryRuleStore(
        [
          ['r:viewer', 'dashboard', 'admin:page', 'page', 'allow'],
          ['r:viewer', 'users', 'admin:page', 'page', 'allow'],
          ['u:bob', 'users', 'admin:page', 'page', 'deny'],
        ],
        { g: [['u:bob', 'r:viewer']] },
      );
      const result = await getAdminActionOptionsBySubject(store, 'u:bob', loadAdminSite(SITE_PATH), {
        cache: new CapabilityTreeCache(),
      });
      expect(result.map((o) => o.value)).toEqual(['dashboard#admin:page#page']);
    });

    it('should show a group when a child page is granted through resource grouping', async () => {
      const store = new MemoryRuleStore(
        [['u:carol', 'logs', 'admin:page', 'page', 'allow']],
        { g2: [['system', 'logs']] },
      );
      const result = await getAdminActionOptionsBySubject(store, 'u:carol', loadAdminSite(SITE_PATH), {
        cache: new CapabilityTreeCache(),
      });
      expect(result.map((o) => o.label)).toEqual(['System']);
      expect(result[0].children?.map((o) => o.label)).toEqual(['Logs']);
    });

    it('should return a copy of the full tree for the root subject without enforcing', async () => {
      const store = new MemoryRuleStore();
      const cache = new CapabilityTreeCache();
      const site = loadAdminSite(SITE_PATH);
      const result = await getAdminActionOptionsBySubject(store, 'u:root', site, { cache });

      expect(result).toEqual(cache.get(site));
      expect(result).not.toBe(cache.get(site));
      expect(store.calls).toEqual([]);
    });

    it('should accept a custom root subject', async () => {
      const store = new MemoryRuleStore();
      const cache = new CapabilityTreeCache();
      const site = loadAdminSite(SITE_PATH);

      const asAdmin = await getAdminActionOptionsBySubject(store, 'u:admin', site, { cache, rootSubject: 'u:admin' });
      expect(asAdmin).toHaveLength(4);

      const asRoot = await getAdminActionOptionsBySubject(store, 'u:root', site, { cache, rootSubject: 'u:admin' });
      expect(asRoot).toEqual([]);
    });

    it('should apply configured labels without an explicit cache', async () => {
      const labels = { list: '查看列表', filter: '筛选列表', submit: '提交' };
      const result = await getAdminActionOptionsBySubject(new MemoryRuleStore(), 'u:root', loadAdminSite(SITE_PATH), {
        labels,
      });
      expect(result[0].children?.slice(0, 2).map((o) => o.label)).toEqual(['查看列表', '筛选列表']);
      expect(result[1].children?.[0].label).toBe('提交');
    });
  });
});
