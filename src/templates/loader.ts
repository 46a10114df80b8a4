import { readFileSync } from 'fs';
import { join } from 'path';
import { createLogger } from '../utils/logger';

const log = createLogger('TEMPLATES');

// Resolves to <root>/templates from both src/templates and dist/templates.
const TEMPLATES_DIR = join(__dirname, '..', '..', 'templates');

const templateCache = new Map<string, string>();

export function loadTemplate(name: string): string {
  const cached = templateCache.get(name);
  if (cached !== undefined) {
    log.debug(`Template loaded from cache: ${name}, length: ${cached.length}`);
    return cached;
  }

  const filePath = join(TEMPLATES_DIR, `${name}.txt`);
  try {
    const content = readFileSync(filePath, 'utf-8');
    templateCache.set(name, content);
    log.debug(`Template loaded from file: ${name}, length: ${content.length}`);
    return content;
  } catch (error) {
    log.error(`Failed to load template: ${name}`, { error: String(error) });
    throw new Error(`Template not found: ${name}`);
  }
}

export function loadPrompt(category: string): string {
  return loadTemplate(`prompts/${category}`);
}

/** Replaces every `{{key}}` placeholder; unknown placeholders are left in place. */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    rendered = rendered.split(placeholder).join(value);
  }
  return rendered;
}

const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/** Names of the `{{key}}` placeholders a template declares, in first-use order. */
export function templatePlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    names.add(match[1]);
  }
  return Array.from(names);
}

/**
 * Loads and renders a prompt, refusing to send one with a placeholder left
 * unfilled. Placeholders are taken from the template, so braces inside the
 * supplied values (e.g. a pasted note) are not mistaken for missing keys.
 */
export function renderPrompt(category: string, variables: Record<string, string>): string {
  const template = loadPrompt(category);
  const missing = templatePlaceholders(template).filter(
    (name) => !Object.prototype.hasOwnProperty.call(variables, name)
  );
  if (missing.length > 0) {
    log.error(`Prompt ${category} rendered without values`, { missing });
    throw new Error(`Prompt ${category} is missing values for: ${missing.join(', ')}`);
  }
  return renderTemplate(template, variables);
}
