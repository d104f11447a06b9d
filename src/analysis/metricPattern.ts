/**
 * 指标名模式匹配
 *
 * 指标名以点分段，模式中的 `*` 恰好匹配一个段，例如
 * `tables.*.*.fragmentation_percent` 匹配 `tables.shop.orders.fragmentation_percent`。
 *
 * @fileoverview 指标名通配匹配
 * @since 1.0.0
 */

const compiled = new Map<string, RegExp>();

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

function compile(pattern: string): RegExp {
  let regex = compiled.get(pattern);
  if (!regex) {
    const source = pattern.split('*').map(escapeRegExp).join('([^.]+)');
    regex = new RegExp(`^${source}$`);
    compiled.set(pattern, regex);
  }
  return regex;
}

export function isPattern(pattern: string): boolean {
  return pattern.includes('*');
}

/**
 * 匹配指标名，返回各 `*` 捕获的段；不匹配时返回 undefined
 */
export function matchMetric(pattern: string, name: string): string[] | undefined {
  if (!isPattern(pattern)) {
    return pattern === name ? [] : undefined;
  }
  const match = compile(pattern).exec(name);
  return match ? match.slice(1) : undefined;
}

/**
 * 用捕获段依次替换模式中的 `*`
 */
export function fillPattern(pattern: string, captures: readonly string[]): string {
  let index = 0;
  return pattern.replace(/\*/g, () => captures[index++] ?? '*');
}
