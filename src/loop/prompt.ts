import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { LoopUsageError } from '../errors.js';
import { logger } from '../utils/logger.js';

const WORK_SCOPE_TOKENS = ['${WORK_SCOPE}', '$WORK_SCOPE'];

export interface PromptOptions {
  /** Replaces ${WORK_SCOPE} in plan-work prompts */
  workScope?: string;
  /** Files whose contents are placed ahead of the prompt */
  contextFiles?: string[];
}

export function substituteWorkScope(template: string, scope: string): string {
  let out = template;
  for (const token of WORK_SCOPE_TOKENS) {
    out = out.split(token).join(scope);
  }
  return out;
}

async function readContext(path: string): Promise<string | null> {
  try {
    const text = await readFile(path, 'utf-8');
    return `## ${basename(path)}\n\n${text.trim()}\n`;
  } catch {
    logger.debug('Context file not readable, skipping', { path });
    return null;
  }
}

export async function loadPrompt(path: string, options: PromptOptions = {}): Promise<string> {
  let template: string;
  try {
    template = await readFile(path, 'utf-8');
  } catch {
    throw new LoopUsageError(`Prompt file not found: ${path}`);
  }

  const body = options.workScope !== undefined ? substituteWorkScope(template, options.workScope) : template;

  const sections: string[] = [];
  for (const contextPath of options.contextFiles ?? []) {
    const section = await readContext(contextPath);
    if (section) sections.push(section);
  }

  return sections.length > 0 ? `${sections.join('\n')}\n${body}` : body;
}
