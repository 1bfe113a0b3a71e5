/**
 * Recommendation templates: loaded from JSON, embedded once at startup.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import type { EmbeddingEngine } from '../analysis/embedder.js';
import { debug } from '../shared/debug.js';
import { ValidationError } from '../shared/errors.js';
import type { RecommendationCandidate } from './types.js';

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(
  new URL('../../data/recommendation-templates.json', import.meta.url),
);

const TemplateSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  text: z.string().min(1),
});

const TemplateListSchema = z.array(TemplateSchema).refine(
  (list) => new Set(list.map((t) => t.id)).size === list.length,
  { message: 'template ids must be unique' },
);

export type RecommendationTemplate = z.infer<typeof TemplateSchema>;

export function parseTemplates(source: unknown): RecommendationTemplate[] {
  const parsed = TemplateListSchema.safeParse(source);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid recommendation templates',
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    );
  }
  return parsed.data;
}

export function loadTemplates(path: string = DEFAULT_TEMPLATES_PATH): RecommendationTemplate[] {
  return parseTemplates(JSON.parse(readFileSync(path, 'utf-8')));
}

/**
 * Embeds each template's category and text together, in one batch.
 */
export async function embedCandidates(
  templates: readonly RecommendationTemplate[],
  engine: EmbeddingEngine,
): Promise<RecommendationCandidate[]> {
  const embeddings = await engine.embedBatch(templates.map((t) => `${t.category}: ${t.text}`));
  debug('recommend', 'Candidates embedded', { count: templates.length, engine: engine.name() });
  return templates.map((t, i) => ({ ...t, embedding: embeddings[i] }));
}
