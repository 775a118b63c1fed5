/**
 * Translation Router
 *
 * Picks the translation path for one sentence from its script mix:
 * - Devanagari + Latin: normalize to Hindi first, then Hindi → English
 * - Devanagari only: Hindi → English
 * - otherwise: auto-detect → English
 */

import { ServiceError, errorMessage } from './errors';
import { Logger, ScriptMix, SourceLanguage, TargetLanguage, TranslationService } from './types';

export type RouteName = 'mixed' | 'hindi' | 'auto';

export interface TranslationStep {
  source: SourceLanguage;
  target: TargetLanguage;
}

export interface TranslationRoute {
  name: RouteName;
  steps: readonly TranslationStep[];
}

const MIXED_ROUTE: TranslationRoute = {
  name: 'mixed',
  steps: [
    { source: 'auto', target: 'hi' },
    { source: 'hi', target: 'en' },
  ],
};

const HINDI_ROUTE: TranslationRoute = {
  name: 'hindi',
  steps: [{ source: 'hi', target: 'en' }],
};

const AUTO_ROUTE: TranslationRoute = {
  name: 'auto',
  steps: [{ source: 'auto', target: 'en' }],
};

export function selectRoute(mix: ScriptMix): TranslationRoute {
  if (mix.hasHindi && mix.hasEnglish) {
    return MIXED_ROUTE;
  }
  if (mix.hasHindi) {
    return HINDI_ROUTE;
  }
  return AUTO_ROUTE;
}

/**
 * Translate one sentence along the route chosen for its script mix.
 * Each step feeds its output to the next. No retries.
 *
 * @throws ServiceError on any failure of the service
 */
export async function routeSentence(
  text: string,
  mix: ScriptMix,
  service: TranslationService,
  log: Logger = () => undefined
): Promise<string> {
  const route = selectRoute(mix);
  log(`[Router] Route "${route.name}" (${route.steps.map(s => `${s.source}→${s.target}`).join(', ')})`);

  let current = text;
  for (const step of route.steps) {
    try {
      current = await service.translate(current, step.source, step.target);
    } catch (error) {
      if (error instanceof ServiceError) {
        throw error;
      }
      throw new ServiceError('unexpected', `Translation service failed: ${errorMessage(error)}`);
    }
  }

  return current;
}
