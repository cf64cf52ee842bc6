/**
 * Merge Engine — composes the contents of an ordered list of prompts into one text.
 *
 * This module is pure: callers resolve and order the prompts, the engine only
 * formats them. No database access occurs here.
 */

import type { MergeOptions, MergeStrategy } from '@promptdeck/shared';
import { UnsupportedStrategyError, ValidationError } from '../errors/AppError.js';

// ─── Input types ──────────────────────────────────────────────────────────────

/**
 * Minimal prompt data required by the merge engine.
 */
export interface MergeablePrompt {
  id: number;
  title: string;
  content: string;
  description: string | null;
  isActive: boolean;
}

export type MergeStrategyFn = (prompts: MergeablePrompt[], options: MergeOptions) => string;

// ─── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_SEPARATOR = '\n\n---\n\n';
export const DEFAULT_BULLET = '• ';
/** `{}` is replaced by the 1-based position. */
export const DEFAULT_NUMBER_FORMAT = '{}. ';

const BLOCK_JOINER = '\n\n';

// ─── Strategies ───────────────────────────────────────────────────────────────

function simpleMerge(prompts: MergeablePrompt[], options: MergeOptions): string {
  const includeTitle = options.includeTitle ?? true;
  return prompts
    .map((prompt) => (includeTitle ? `## ${prompt.title}\n\n${prompt.content}` : prompt.content))
    .join(BLOCK_JOINER);
}

function separatorMerge(prompts: MergeablePrompt[], options: MergeOptions): string {
  const includeTitle = options.includeTitle ?? true;
  const includeDescription = options.includeDescription ?? false;
  const separator = options.separator ?? DEFAULT_SEPARATOR;

  return prompts
    .map((prompt) => {
      const parts: string[] = [];
      if (includeTitle) parts.push(`## ${prompt.title}`);
      if (includeDescription && prompt.description) parts.push(`*${prompt.description}*`);
      parts.push(prompt.content);
      return parts.join(BLOCK_JOINER);
    })
    .join(separator);
}

function numberedMerge(prompts: MergeablePrompt[], options: MergeOptions): string {
  const includeTitle = options.includeTitle ?? true;
  const numberFormat = options.numberFormat ?? DEFAULT_NUMBER_FORMAT;

  return prompts
    .map((prompt, index) => {
      const marker = numberFormat.replace('{}', String(index + 1));
      return includeTitle
        ? `${marker}**${prompt.title}**\n\n${prompt.content}`
        : `${marker}${prompt.content}`;
    })
    .join(BLOCK_JOINER);
}

function bulletedMerge(prompts: MergeablePrompt[], options: MergeOptions): string {
  const includeTitle = options.includeTitle ?? true;
  const bullet = options.bullet ?? DEFAULT_BULLET;

  return prompts
    .map((prompt) => {
      // Continuation lines are indented so they nest under the bullet
      const body = prompt.content.split('\n').join('\n  ');
      return includeTitle ? `${bullet}**${prompt.title}**\n  ${body}` : `${bullet}${body}`;
    })
    .join(BLOCK_JOINER);
}

/**
 * Build the placeholder → value map for the template strategy.
 * Per-prompt keys are 1-based.
 */
export function buildTemplateVariables(prompts: MergeablePrompt[]): Map<string, string> {
  const variables = new Map<string, string>([
    ['count', String(prompts.length)],
    ['titles', prompts.map((p) => p.title).join(', ')],
    ['prompts', prompts.map((p) => p.content).join(BLOCK_JOINER)],
  ]);

  prompts.forEach((prompt, index) => {
    const n = index + 1;
    variables.set(`prompt_${n}`, `${prompt.title}\n\n${prompt.content}`);
    variables.set(`title_${n}`, prompt.title);
    variables.set(`content_${n}`, prompt.content);
    variables.set(`description_${n}`, prompt.description ?? '');
  });

  return variables;
}

/**
 * Replace `{key}` placeholders with their values in a single left-to-right pass.
 * Substituted text is never scanned again, and unknown keys are left verbatim.
 */
export function substitutePlaceholders(template: string, variables: Map<string, string>): string {
  let result = '';
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf('{', cursor);
    if (open === -1) break;
    const close = template.indexOf('}', open + 1);
    if (close === -1) break;

    const value = variables.get(template.slice(open + 1, close));
    if (value === undefined) {
      // Keep the brace and resume right after it, so "{{count}" still resolves the inner key
      result += template.slice(cursor, open + 1);
      cursor = open + 1;
    } else {
      result += template.slice(cursor, open) + value;
      cursor = close + 1;
    }
  }

  return result + template.slice(cursor);
}

function templateMerge(prompts: MergeablePrompt[], options: MergeOptions): string {
  if (!options.template) {
    throw new ValidationError('Template cannot be empty');
  }
  return substitutePlaceholders(options.template, buildTemplateVariables(prompts));
}

const STRATEGIES: Record<MergeStrategy, MergeStrategyFn> = {
  simple: simpleMerge,
  separator: separatorMerge,
  numbered: numberedMerge,
  bulleted: bulletedMerge,
  template: templateMerge,
};

export const MERGE_STRATEGIES: MergeStrategy[] = Object.keys(STRATEGIES).filter(isMergeStrategy);

export function isMergeStrategy(name: string): name is MergeStrategy {
  return Object.prototype.hasOwnProperty.call(STRATEGIES, name);
}

/**
 * Merge prompts with the named strategy. Prompts are used in the order given.
 *
 * @throws UnsupportedStrategyError for an unknown strategy name
 * @throws ValidationError when the template strategy has no template
 */
export function composeMerge(
  strategy: string,
  prompts: MergeablePrompt[],
  options: MergeOptions = {},
): string {
  if (!isMergeStrategy(strategy)) {
    throw new UnsupportedStrategyError(strategy);
  }
  return STRATEGIES[strategy](prompts, options);
}
