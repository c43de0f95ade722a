import type { Logger } from '../logger.js';
import type { Rule } from '../types.js';

export interface RuleMatch {
  rule: Rule;
  groups: Record<string, string>;
}

const NAMED_GROUP = /\(\?<([A-Za-z_$][\w$]*)>/g;
const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Accept `(?P<name>...)` / `(?P=name)` group syntax in addition to the
 * JavaScript forms, so older rule files keep working.
 */
export function translatePatternSyntax(pattern: string): string {
  return pattern.replace(/\(\?P<(\w+)>/g, '(?<$1>').replace(/\(\?P=(\w+)\)/g, '\\k<$1>');
}

export function namedGroups(pattern: string): string[] {
  return Array.from(pattern.matchAll(NAMED_GROUP), (match) => match[1]);
}

export function templatePlaceholders(template: string): string[] {
  return Array.from(template.matchAll(PLACEHOLDER), (match) => match[1]);
}

// Captured values end up as directory names
function sanitizeSegment(value: string): string {
  return value.replace(/[<>:"/\\|?*]/g, '-').replace(/^\.{1,2}$/, '-');
}

/**
 * Substitute `{group}` placeholders with captured values. Unknown
 * placeholders are left as written.
 */
export function expandDestination(template: string, groups: Record<string, string>): string {
  return template.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.hasOwn(groups, name) ? sanitizeSegment(groups[name]) : placeholder
  );
}

/**
 * First rule whose pattern matches at the start of the filename wins.
 */
export function matchRule(filename: string, rules: readonly Rule[]): RuleMatch | null {
  for (const rule of rules) {
    const match = rule.regex.exec(filename);
    // Leftmost match not at 0 means there is no match anchored at 0 either
    if (!match || match.index !== 0) continue;

    const groups: Record<string, string> = {};
    for (const [name, value] of Object.entries(match.groups ?? {})) {
      groups[name] = value ?? '';
    }
    return { rule, groups };
  }
  return null;
}

export class PatternMatcher {
  constructor(
    private readonly rules: readonly Rule[],
    private readonly logger: Logger
  ) {}

  public match(filename: string): RuleMatch | null {
    const result = matchRule(filename, this.rules);
    if (result) {
      this.logger.info(`${filename} matches pattern: ${result.rule.pattern}`);
    } else {
      this.logger.debug(`No matching pattern for ${filename}`);
    }
    return result;
  }
}
