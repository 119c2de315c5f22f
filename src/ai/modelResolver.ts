/**
 * Model resolver — decides which chat model the SQL generator talks to.
 *
 * A configured model is checked once against the account's model list. When
 * it is missing there (a stale name copied from an old example, say), a
 * default is picked instead. Fine-tuned ids are trusted as given.
 * Both outcomes are cached for the lifetime of the resolver.
 */

import type { OpenAI } from 'openai';
import { GenerationError, toError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Cheapest first. */
export const PREFERRED_MODELS = [
  'gpt-4o-mini',
  'gpt-4.1-mini',
  'gpt-4.1-nano',
  'gpt-4o',
  'gpt-4.1',
] as const;

const NON_CHAT_MARKERS = ['audio', 'realtime', 'tts', 'transcribe', 'image', 'search', 'instruct'];

export interface ModelResolverDeps {
  openai: OpenAI;
  configuredModel?: string;
}

export function isChatModel(id: string): boolean {
  return id.startsWith('gpt-') && !NON_CHAT_MARKERS.some((marker) => id.includes(marker));
}

export function pickDefaultModel(available: string[]): string {
  const availableSet = new Set(available);
  const preferred = PREFERRED_MODELS.find((candidate) => availableSet.has(candidate));
  return preferred ?? available[0];
}

export function createModelResolver(deps: ModelResolverDeps) {
  const { openai } = deps;
  const configured = deps.configuredModel?.trim() ?? '';

  let configuredValid: boolean | null = null;
  let fallbackModel: string | null = null;

  async function listChatModels(): Promise<string[]> {
    const ids: string[] = [];
    try {
      for await (const model of openai.models.list()) {
        if (isChatModel(model.id)) {
          ids.push(model.id);
        }
      }
    } catch (err) {
      throw new GenerationError('Failed to list available models', { cause: toError(err) });
    }
    return ids;
  }

  function chooseFallback(available: string[]): string {
    if (!available.length) {
      throw new GenerationError(
        'No chat models are available for this API key. Set OPENAI_MODEL explicitly.',
      );
    }
    fallbackModel = pickDefaultModel(available);
    logger.info(
      { model: fallbackModel, availableCount: available.length },
      'Model resolver: default model picked',
    );
    return fallbackModel;
  }

  async function resolve(): Promise<string> {
    if (configured && configuredValid === true) {
      return configured;
    }
    if (fallbackModel) {
      return fallbackModel;
    }

    if (configured && configuredValid === null) {
      if (configured.startsWith('ft:')) {
        configuredValid = true;
        return configured;
      }

      const available = await listChatModels();
      if (available.includes(configured)) {
        configuredValid = true;
        return configured;
      }

      configuredValid = false;
      logger.warn({ configured }, 'Model resolver: configured model unavailable, falling back');
      return chooseFallback(available);
    }

    return chooseFallback(await listChatModels());
  }

  return { resolve };
}

export type ModelResolver = ReturnType<typeof createModelResolver>;
