import { jest, describe, it, expect, beforeEach } from '@jest/globals';

jest.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { createSqlGenerator } from '../../../src/ai/sqlGenerator.js';
import { buildSystemPrompt, buildUserPrompt } from '../../../src/ai/prompts/system.js';
import { GenerationError, ValidationError } from '../../../src/utils/errors.js';

// ── Mock helpers ──────────────────────────────────────────────

type Completion = { choices: Array<{ message: { content: string | null } }> };

const SCHEMA_CONTEXT = '[dbo].[Customers] (BASE TABLE)\n  - Name: nvarchar(200) NULL';

function createMockOpenAI(content: string | null = 'SELECT TOP (100) Name FROM [dbo].[Customers]') {
  return {
    chat: {
      completions: {
        create: jest.fn<(body: unknown, options: unknown) => Promise<Completion>>()
          .mockResolvedValue({ choices: [{ message: { content } }] }),
      },
    },
  };
}

function createMockResolver(model = 'gpt-4o-mini') {
  return {
    resolve: jest.fn<() => Promise<string>>().mockResolvedValue(model),
  };
}

describe('createSqlGenerator', () => {
  let openai: ReturnType<typeof createMockOpenAI>;
  let modelResolver: ReturnType<typeof createMockResolver>;

  beforeEach(() => {
    jest.clearAllMocks();
    openai = createMockOpenAI();
    modelResolver = createMockResolver();
  });

  it('returns the trimmed candidate text', async () => {
    openai = createMockOpenAI('\n  SELECT Name FROM [dbo].[Customers]  \n');
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    await expect(generator.generate('Who are my customers?', SCHEMA_CONTEXT)).resolves.toBe(
      'SELECT Name FROM [dbo].[Customers]',
    );
  });

  it('sends the system rules, schema and question to the resolved model', async () => {
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    await generator.generate('  Who are my customers?  ', SCHEMA_CONTEXT);

    expect(openai.chat.completions.create).toHaveBeenCalledWith(
      {
        model: 'gpt-4o-mini',
        temperature: 0,
        top_p: 0.1,
        max_tokens: 512,
        messages: [
          { role: 'system', content: buildSystemPrompt() },
          { role: 'user', content: buildUserPrompt('Who are my customers?', SCHEMA_CONTEXT) },
        ],
      },
      { timeout: 30_000 },
    );
  });

  it('rejects an empty question without calling the model', async () => {
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    await expect(generator.generate('   ', SCHEMA_CONTEXT)).rejects.toThrow(ValidationError);
    await expect(generator.generate('', SCHEMA_CONTEXT)).rejects.toThrow('Question is required');
    expect(openai.chat.completions.create).not.toHaveBeenCalled();
    expect(modelResolver.resolve).not.toHaveBeenCalled();
  });

  it('throws GenerationError when the model returns nothing', async () => {
    openai = createMockOpenAI('   ');
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    await expect(generator.generate('Revenue?', SCHEMA_CONTEXT)).rejects.toThrow(
      'The model returned an empty response',
    );
  });

  it('throws GenerationError when the response has no choices', async () => {
    openai.chat.completions.create.mockResolvedValue({ choices: [] });
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    await expect(generator.generate('Revenue?', SCHEMA_CONTEXT)).rejects.toThrow(GenerationError);
  });

  it('wraps upstream failures in GenerationError naming the model', async () => {
    const upstream = new Error('404 model not found');
    openai.chat.completions.create.mockRejectedValue(upstream);
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    try {
      await generator.generate('Revenue?', SCHEMA_CONTEXT);
      throw new Error('expected a GenerationError');
    } catch (err) {
      expect(err).toBeInstanceOf(GenerationError);
      if (!(err instanceof GenerationError)) return;
      expect(err.message).toBe(
        "Model request failed using model 'gpt-4o-mini'. Check OPENAI_MODEL and OPENAI_API_KEY.",
      );
      expect(err.statusCode).toBe(502);
      expect(err.cause).toBe(upstream);
    }
  });

  it('passes resolver errors through unchanged', async () => {
    const resolverError = new GenerationError('Failed to list available models');
    modelResolver.resolve.mockRejectedValue(resolverError);
    const generator = createSqlGenerator({ openai: openai as never, modelResolver });

    await expect(generator.generate('Revenue?', SCHEMA_CONTEXT)).rejects.toBe(resolverError);
  });
});
