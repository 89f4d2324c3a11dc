/**
 * RuleSet - Ordered path rules deciding what a sync may touch
 *
 * One rule set per direction. Rules are evaluated top to bottom and the
 * first matching rule wins; a path no rule matches is allowed.
 *
 * Pattern syntax is the gitignore/rsync glob subset both sides agree on:
 * - `*`, `?`, `[...]` within one path segment, `**` across segments
 * - leading `/` anchors to the tree root
 * - trailing `/` matches directories only
 * - a pattern matching a directory matches everything below it
 *
 * Rules files use rsync merge-filter syntax, so the same file can be read
 * here and handed to rsync:
 * ```
 * # comment
 * - /.storage/auth       (exclude: never transferred, never deleted)
 * P /secrets.yaml        (protect: never deleted, may be created/updated)
 * + /configuration.yaml  (allow: transfer normally)
 * backups/               (bare pattern: exclude)
 * ```
 */

import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import ignore, { Ignore } from 'ignore';
import { ConfigError, describeError } from '../errors/syncErrors.js';
import { log } from '../utils/logger.js';

export type RuleAction = 'exclude' | 'protect' | 'allow';

export type EntryKind = 'file' | 'dir';

export type SyncDirection = 'push' | 'pull';

export interface Rule {
  pattern: string;
  action: RuleAction;
  /** 1-based line in the rules file, when loaded from one */
  line?: number;
}

/**
 * Native filter prefix for each action (rsync merge-file short forms)
 */
const FILTER_PREFIX: Record<RuleAction, string> = {
  exclude: '-',
  protect: 'P',
  allow: '+',
};

/**
 * Accepted action keywords in rules files
 */
const ACTION_KEYWORDS: Record<string, RuleAction> = {
  '-': 'exclude',
  exclude: 'exclude',
  P: 'protect',
  protect: 'protect',
  '+': 'allow',
  include: 'allow',
  allow: 'allow',
};

interface CompiledRule extends Rule {
  matcher: Ignore;
}

/**
 * Immutable ordered rule list with first-match classification
 */
export class RuleSet {
  readonly rules: readonly Rule[];
  readonly origin: string;
  private readonly compiled: readonly CompiledRule[];

  private constructor(rules: Rule[], origin: string) {
    this.origin = origin;
    this.rules = Object.freeze(rules.map(rule => Object.freeze({ ...rule })));
    this.compiled = Object.freeze(
      this.rules.map(rule => ({ ...rule, matcher: ignore({ allowRelativePaths: true }).add(rule.pattern) }))
    );
  }

  // ============================================================================
  // Factory Methods
  // ============================================================================

  /**
   * Build a rule set from rule objects
   *
   * @throws ConfigError if the list is empty, a pattern is malformed, or an
   *   allow/protect rule lies below a directory a later rule excludes
   */
  static fromRules(rules: readonly Rule[], origin = '<inline>'): RuleSet {
    const ruleSet = RuleSet.validated(rules, origin);
    ruleSet.assertReachable();
    return ruleSet;
  }

  /**
   * Parse rules file content
   *
   * @param text - File content, one rule per line
   * @param origin - Name used in error messages (usually the file path)
   * @throws ConfigError on malformed line or empty rule set
   */
  static parse(text: string, origin = '<inline>'): RuleSet {
    return RuleSet.fromRules(parseRuleLines(text, origin), origin);
  }

  /**
   * Rebuild a rule set from native filter lines produced by toFilterLines().
   * The lines come from a rule set that already passed fromRules(), so only
   * the syntax is checked again.
   */
  static fromFilterLines(lines: readonly string[], origin = '<filter>'): RuleSet {
    return RuleSet.validated(parseRuleLines(lines.join('\n'), origin), origin);
  }

  private static validated(rules: readonly Rule[], origin: string): RuleSet {
    if (rules.length === 0) {
      throw new ConfigError(`Rule set ${origin} is empty`, { origin });
    }

    for (const rule of rules) {
      if (!Object.prototype.hasOwnProperty.call(FILTER_PREFIX, rule.action)) {
        throw new ConfigError(`${describeLocation(origin, rule.line)}: unknown action "${rule.action}"`, { origin });
      }
      const problem = validatePattern(rule.pattern);
      if (problem) {
        throw new ConfigError(
          `${describeLocation(origin, rule.line)}: malformed pattern "${rule.pattern}": ${problem}`,
          { origin, line: rule.line, pattern: rule.pattern }
        );
      }
    }

    return new RuleSet([...rules], origin);
  }

  // ============================================================================
  // Classification
  // ============================================================================

  /**
   * Classify a path: action of the first rule matching the path or one of its
   * ancestor directories, `allow` when no rule matches.
   *
   * @param relPath - Normalized relative path (`a/b/c`)
   * @param kind - Kind of the entry at relPath; directory-only patterns need it
   */
  classify(relPath: string, kind: EntryKind): RuleAction {
    const index = this.firstMatch(relPath, kind);
    return index === -1 ? 'allow' : this.compiled[index].action;
  }

  private firstMatch(relPath: string, kind: EntryKind): number {
    const candidates = candidatePaths(relPath, kind);
    return this.compiled.findIndex(rule => candidates.some(candidate => rule.matcher.ignores(candidate)));
  }

  /**
   * rsync never descends into a directory it excludes, so an allow or
   * protect rule for paths below a directory that a later rule excludes
   * could not take effect there.
   */
  private assertReachable(): void {
    this.rules.forEach((rule, index) => {
      if (rule.action === 'exclude') {
        return;
      }

      const { ancestors, bounded } = literalAncestors(rule.pattern);

      for (const ancestor of ancestors) {
        const matched = this.firstMatch(ancestor, 'dir');
        if (matched > index && this.rules[matched].action === 'exclude') {
          throw unreachableRule(this.origin, rule, this.rules[matched], `directory ${ancestor}/`);
        }
      }

      if (!bounded) {
        const laterExclude = this.rules.slice(index + 1).find(later => later.action === 'exclude');
        if (laterExclude) {
          throw unreachableRule(this.origin, rule, laterExclude, 'any directory it matches');
        }
      }
    });
  }

  // ============================================================================
  // Native Filter Derivation
  // ============================================================================

  /**
   * Express the rule set in rsync merge-filter syntax.
   *
   * Each rule is emitted for the matched entry and again with a `/**`
   * companion, so the transfer tool applies a directory rule to everything
   * below it in the same order classify() does. Patterns holding an inner
   * `/` get a leading `/`: gitignore anchors them, rsync would not.
   *
   * rsync reads `P` on the receiving side only, so each protect rule is
   * followed by the same patterns as `+`: the sender includes the path
   * before a later exclude rule can match it. Read back, the `P` lines
   * still match first.
   */
  toFilterLines(): string[] {
    const lines: string[] = [];

    for (const rule of this.rules) {
      const patterns = filterPatterns(rule.pattern);
      patterns.forEach(pattern => lines.push(`${FILTER_PREFIX[rule.action]} ${pattern}`));

      if (rule.action === 'protect') {
        patterns.forEach(pattern => lines.push(`${FILTER_PREFIX.allow} ${pattern}`));
      }
    }

    return lines;
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a rules file
 *
 * @throws ConfigError if the file cannot be read or holds invalid rules
 */
export async function loadRuleSet(filePath: string): Promise<RuleSet> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read rules file ${filePath}: ${describeError(error)}`, { filePath });
  }

  const ruleSet = RuleSet.parse(content, filePath);
  log.debug(`[RULES] Loaded ${ruleSet.rules.length} rules from ${filePath}`);
  return ruleSet;
}

/**
 * Path of the rules file shipped for a direction
 */
export function defaultRulesPath(direction: SyncDirection): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(currentDir, '..', '..', 'rules', `${direction}.rules`);
}

/**
 * Load the shipped rules file for a direction
 */
export function loadDefaultRuleSet(direction: SyncDirection): Promise<RuleSet> {
  return loadRuleSet(defaultRulesPath(direction));
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split rules file content into rules; patterns are validated by the caller
 */
function parseRuleLines(text: string, origin: string): Rule[] {
  const rules: Rule[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }

    const lineNumber = index + 1;
    const space = trimmed.search(/\s/);

    if (space === -1) {
      // Bare pattern, as in a plain exclude-from file
      if (lookupAction(trimmed)) {
        throw new ConfigError(
          `${describeLocation(origin, lineNumber)}: action "${trimmed}" has no pattern`,
          { origin, line: lineNumber }
        );
      }
      rules.push({ pattern: trimmed, action: 'exclude', line: lineNumber });
      return;
    }

    const keyword = trimmed.slice(0, space);
    const pattern = trimmed.slice(space).trim();
    const action = lookupAction(keyword);

    if (!action) {
      throw new ConfigError(
        `${describeLocation(origin, lineNumber)}: unknown action "${keyword}" (expected -, +, P, exclude, include, allow or protect)`,
        { origin, line: lineNumber }
      );
    }

    rules.push({ pattern, action, line: lineNumber });
  });

  return rules;
}

/**
 * Paths tested against each rule: every ancestor as a directory, then the
 * path itself (with a trailing slash when it is a directory)
 */
function candidatePaths(relPath: string, kind: EntryKind): string[] {
  const segments = relPath.split('/');
  const candidates: string[] = [];

  for (let i = 1; i < segments.length; i++) {
    candidates.push(segments.slice(0, i).join('/') + '/');
  }
  candidates.push(kind === 'dir' ? `${relPath}/` : relPath);

  return candidates;
}

/**
 * Check a pattern; returns the problem, or null when it is usable
 */
function validatePattern(pattern: string): string | null {
  if (!pattern || !pattern.trim()) {
    return 'empty pattern';
  }
  if (pattern.startsWith('#')) {
    return 'leading # reads as a comment, escape it as \\#';
  }
  if (pattern.startsWith('!')) {
    return 'negation is not supported, use an allow rule placed earlier';
  }
  if (/^\/+$/.test(pattern)) {
    return 'pattern matches the tree root';
  }
  if (pattern.split('/').some(segment => segment === '..' || segment === '.')) {
    return 'relative segments (. or ..) are not allowed';
  }
  if (/(^|[^\\])(\\\\)*\\$/.test(pattern)) {
    return 'dangling escape';
  }

  let depth = 0;
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '[') {
      if (depth > 0) {
        return 'nested character class';
      }
      depth++;
    } else if (ch === ']' && depth > 0) {
      depth--;
    }
  }
  if (depth !== 0) {
    return 'unterminated character class';
  }

  return null;
}

function lookupAction(keyword: string): RuleAction | undefined {
  return Object.prototype.hasOwnProperty.call(ACTION_KEYWORDS, keyword)
    ? ACTION_KEYWORDS[keyword]
    : undefined;
}

/**
 * Literal directories above every path a pattern can match. `bounded` is
 * false when the pattern can match at a depth not known in advance
 * (unanchored, or a wildcard before the last segment).
 */
function literalAncestors(pattern: string): { ancestors: string[]; bounded: boolean } {
  const trimmed = pattern.replace(/\/+$/, '');
  if (!trimmed.includes('/')) {
    return { ancestors: [], bounded: false };
  }

  const segments = trimmed.split('/').filter(segment => segment !== '');
  const ancestors: string[] = [];

  for (let i = 0; i < segments.length - 1; i++) {
    if (/[*?[\\]/.test(segments[i])) {
      return { ancestors, bounded: false };
    }
    ancestors.push(segments.slice(0, i + 1).join('/'));
  }

  return { ancestors, bounded: true };
}

function unreachableRule(origin: string, rule: Rule, exclude: Rule, target: string): ConfigError {
  return new ConfigError(
    `${describeLocation(origin, rule.line)}: ${rule.action} rule "${rule.pattern}" cannot apply below ${target}: ` +
    `the later rule "${exclude.pattern}" excludes it and the transfer tool does not descend into excluded directories`,
    { origin, line: rule.line, pattern: rule.pattern, excludedBy: exclude.pattern }
  );
}

function filterPatterns(pattern: string): string[] {
  const anchored = anchorForRsync(pattern);
  return anchored.endsWith('**')
    ? [anchored]
    : [anchored, `${anchored.replace(/\/+$/, '')}/**`];
}

function anchorForRsync(pattern: string): string {
  if (pattern.startsWith('/') || pattern.startsWith('**')) {
    return pattern;
  }
  const inner = pattern.replace(/\/+$/, '');
  return inner.includes('/') ? `/${pattern}` : pattern;
}

function describeLocation(origin: string, line?: number): string {
  return line === undefined ? origin : `${origin}:${line}`;
}
