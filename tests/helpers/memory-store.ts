import type { RuleStore } from '../../src/policy/types.js';

/**
 * 进程内的 RuleStore 替身。
 *
 * 模拟 casbin 的行为：过滤字段为空字符串时不参与匹配；
 * 批量添加时任意一条已存在、批量删除时任意一条不存在，整批失败并返回 false。
 * enforce 使用与 config/policy-model.conf 相同的语义（g 角色继承、g2 资源继承、deny 优先）。
 */
export class MemoryRuleStore implements RuleStore {
  readonly policies: string[][] = [];
  readonly groupings = new Map<string, string[][]>();
  /** 按调用顺序记录的方法名。 */
  readonly calls: string[] = [];

  constructor(policies: string[][] = [], groupings: Record<string, string[][]> = {}) {
    this.policies.push(...policies.map((rule) => [...rule]));
    for (const [ptype, rules] of Object.entries(groupings)) {
      this.groupings.set(ptype, rules.map((rule) => [...rule]));
    }
  }

  /** 写操作的调用次数。 */
  get writeCount(): number {
    return this.calls.filter((name) => name.startsWith('add') || name.startsWith('remove') || name.startsWith('delete')).length;
  }

  private named(ptype: string): string[][] {
    let rules = this.groupings.get(ptype);
    if (!rules) {
      rules = [];
      this.groupings.set(ptype, rules);
    }
    return rules;
  }

  private static matches(rule: readonly string[], fieldIndex: number, fieldValues: readonly string[]): boolean {
    return fieldValues.every((value, i) => value === '' || rule[fieldIndex + i] === value);
  }

  private static indexOf(rules: readonly string[][], rule: readonly string[]): number {
    return rules.findIndex((r) => r.length === rule.length && r.every((v, i) => v === rule[i]));
  }

  /** 沿 grouping 关系求传递闭包（包含自身）。 */
  private closure(ptype: string, start: string): Set<string> {
    const seen = new Set([start]);
    const queue = [start];
    while (queue.length > 0) {
      const current = queue.shift();
      for (const [from, to] of this.named(ptype)) {
        if (from === current && !seen.has(to)) {
          seen.add(to);
          queue.push(to);
        }
      }
    }
    return seen;
  }

  async enforce(...rvals: string[]): Promise<boolean> {
    this.calls.push('enforce');
    const [sub, v1, v2, v3] = rvals;
    const subjects = this.closure('g', sub);
    const resources = this.closure('g2', v1);
    let allowed = false;
    for (const [pSub, pV1, pV2, pV3, eft] of this.policies) {
      if (subjects.has(pSub) && resources.has(pV1) && pV2 === v2 && pV3 === v3) {
        if (eft === 'deny') {
          return false;
        }
        allowed = true;
      }
    }
    return allowed;
  }

  async getFilteredPolicy(fieldIndex: number, ...fieldValues: string[]): Promise<string[][]> {
    this.calls.push('getFilteredPolicy');
    return this.policies
      .filter((rule) => MemoryRuleStore.matches(rule, fieldIndex, fieldValues))
      .map((rule) => [...rule]);
  }

  async getImplicitPermissionsForUser(user: string): Promise<string[][]> {
    this.calls.push('getImplicitPermissionsForUser');
    const subjects = this.closure('g', user);
    return this.policies.filter((rule) => subjects.has(rule[0])).map((rule) => [...rule]);
  }

  async hasPolicy(...params: string[]): Promise<boolean> {
    this.calls.push('hasPolicy');
    return MemoryRuleStore.indexOf(this.policies, params) !== -1;
  }

  async addPolicies(rules: string[][]): Promise<boolean> {
    this.calls.push('addPolicies');
    return MemoryRuleStore.addAll(this.policies, rules);
  }

  async removePolicies(rules: string[][]): Promise<boolean> {
    this.calls.push('removePolicies');
    return MemoryRuleStore.removeAll(this.policies, rules);
  }

  async addGroupingPolicies(rules: string[][]): Promise<boolean> {
    this.calls.push('addGroupingPolicies');
    return MemoryRuleStore.addAll(this.named('g'), rules);
  }

  async deleteRolesForUser(user: string): Promise<boolean> {
    this.calls.push('deleteRolesForUser');
    const rules = this.named('g');
    const before = rules.length;
    for (let i = rules.length - 1; i >= 0; i--) {
      if (rules[i][0] === user) {
        rules.splice(i, 1);
      }
    }
    return rules.length !== before;
  }

  async getFilteredNamedGroupingPolicy(ptype: string, fieldIndex: number, ...fieldValues: string[]): Promise<string[][]> {
    this.calls.push('getFilteredNamedGroupingPolicy');
    return this.named(ptype)
      .filter((rule) => MemoryRuleStore.matches(rule, fieldIndex, fieldValues))
      .map((rule) => [...rule]);
  }

  async hasNamedGroupingPolicy(ptype: string, ...params: string[]): Promise<boolean> {
    this.calls.push('hasNamedGroupingPolicy');
    return MemoryRuleStore.indexOf(this.named(ptype), params) !== -1;
  }

  async addNamedGroupingPolicies(ptype: string, rules: string[][]): Promise<boolean> {
    this.calls.push('addNamedGroupingPolicies');
    return MemoryRuleStore.addAll(this.named(ptype), rules);
  }

  async removeNamedGroupingPolicies(ptype: string, rules: string[][]): Promise<boolean> {
    this.calls.push('removeNamedGroupingPolicies');
    return MemoryRuleStore.removeAll(this.named(ptype), rules);
  }

  private static addAll(target: string[][], rules: readonly string[][]): boolean {
    if (rules.some((rule) => MemoryRuleStore.indexOf(target, rule) !== -1)) {
      return false;
    }
    target.push(...rules.map((rule) => [...rule]));
    return true;
  }

  private static removeAll(target: string[][], rules: readonly string[][]): boolean {
    if (rules.some((rule) => MemoryRuleStore.indexOf(target, rule) === -1)) {
      return false;
    }
    for (const rule of rules) {
      target.splice(MemoryRuleStore.indexOf(target, rule), 1);
    }
    return true;
  }
}
