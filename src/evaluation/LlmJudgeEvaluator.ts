import pino from 'pino';
import { z } from 'zod';
import { config } from '../config.js';
import type { ChatCompletionProvider } from '../openai/OpenAiClient.js';
import { NoopEvaluator, type EvaluationInput, type IQualityEvaluator } from './IQualityEvaluator.js';

const logger = pino({ name: 'LlmJudgeEvaluator' });

const score = z.coerce.number().min(1).max(10);

export const judgeVerdictSchema = z.object({
  overall: score,
  relevance: score,
  accuracy: score,
  completeness: score,
  clarity: score,
  helpfulness: score,
  feedback: z.string().optional(),
});

export type JudgeVerdict = z.output<typeof judgeVerdictSchema>;

const JUDGE_SYSTEM_PROMPT = `You rate customer service replies of an online store.
Score the reply from 1 to 10 on relevance, accuracy, completeness, clarity and helpfulness,
plus an overall score. Answer with a single JSON object:
{"overall": n, "relevance": n, "accuracy": n, "completeness": n, "clarity": n, "helpfulness": n, "feedback": "..."}`;

/**
 * Extract the first JSON object from a model reply (models sometimes wrap it
 * in a code fence or prose).
 */
export function parseVerdict(content: string): JudgeVerdict | null {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content.slice(start, end + 1));
  } catch {
    return null;
  }
  const result = judgeVerdictSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export interface LlmJudgeEvaluatorOptions {
  provider: ChatCompletionProvider;
  model?: string;
}

export class LlmJudgeEvaluator implements IQualityEvaluator {
  private readonly provider: ChatCompletionProvider;
  private readonly model: string;

  constructor(options: LlmJudgeEvaluatorOptions) {
    this.provider = options.provider;
    this.model = options.model ?? config.evaluation.model;
  }

  async evaluate(input: EvaluationInput): Promise<void> {
    const response = await this.provider.runWithTools({
      input: [
        { role: 'system', content: JUDGE_SYSTEM_PROMPT },
        {
          role: 'user',
          content: `Customer query:\n${input.query}\n\nAssistant reply:\n${input.response}`,
        },
      ],
      model: this.model,
      maxTokens: 300,
      route: 'evaluation.judge',
    });

    const verdict = parseVerdict(response.content ?? '');
    if (!verdict) {
      logger.warn({ sessionId: input.sessionId }, 'Judge returned an unusable verdict');
      return;
    }

    logger.info({
      sessionId: input.sessionId,
      handlersUsed: input.handlersUsed,
      scores: verdict,
    }, 'Response quality evaluated');
  }
}

export function createQualityEvaluator(provider: ChatCompletionProvider): IQualityEvaluator {
  return config.evaluation.enabled ? new LlmJudgeEvaluator({ provider }) : new NoopEvaluator();
}
