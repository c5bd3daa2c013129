import { readFileSync, existsSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const templateSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  baseUrl: z.string().url(),
  search: z.object({
    path: z.string().includes('{query}', { message: 'search.path must contain {query}' }),
    item: z.string(),
    link: z.string(),
    title: z.string().optional(),
    cover: z.string().optional(),
  }),
  chapters: z.object({
    container: z.string(),
    item: z.string(),
    link: z.string(),
    title: z.string().optional(),
    date: z.string().optional(),
    loadMore: z.string().optional(),
  }),
});

export type TemplateConfig = z.infer<typeof templateSchema>;

const templatesCache = new Map<string, TemplateConfig>();

export function getTemplatesDir(): string {
  return join(__dirname, '../../templates');
}

export function parseTemplate(raw: unknown, name: string): TemplateConfig {
  const result = templateSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Template "${name}" is invalid: ${result.error.message}`, {
      errors: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}

export function loadTemplate(name: string, templatesDir: string = getTemplatesDir()): TemplateConfig {
  const cacheKey = join(templatesDir, name);
  const cached = templatesCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const templatePath = join(templatesDir, `${name}.json`);

  if (!existsSync(templatePath)) {
    logger.error({ templatePath, name }, 'Template not found');
    throw new ConfigError(`Template "${name}" not found at ${templatePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(templatePath, 'utf-8'));
  } catch (error) {
    logger.error({ error, name }, 'Failed to read template');
    throw new ConfigError(`Failed to read template "${name}": ${error}`);
  }

  const validated = parseTemplate(parsed, name);
  templatesCache.set(cacheKey, validated);
  logger.debug({ name }, 'Template loaded successfully');
  return validated;
}
