/**
 * Text generation configuration.
 *
 * Generation only rephrases final suggestions from their reasoning trace,
 * so it is off unless explicitly enabled.
 * Resolution order: HEALTH_COACH_GENERATION env var > config.json
 * `generation` > disabled.
 */

import { readConfigJson } from '../shared/config.js';
import { debug } from '../shared/debug.js';

export interface GenerationConfig {
  enabled: boolean;
  model: string;
}

const DEFAULT_MODEL = 'claude-haiku-4-5';

export function loadGenerationConfig(): GenerationConfig {
  const file = readConfigJson();
  const model =
    (typeof file.generationModel === 'string' && file.generationModel.length > 0
      ? file.generationModel
      : null) ?? DEFAULT_MODEL;

  const envVal = process.env.HEALTH_COACH_GENERATION;
  if (envVal === '1' || envVal === 'true') {
    return { enabled: true, model };
  }
  if (envVal === '0' || envVal === 'false') {
    return { enabled: false, model };
  }

  if (file.generation === true) {
    return { enabled: true, model };
  }

  debug('config', 'Generation disabled -- suggestions use template text');
  return { enabled: false, model };
}
