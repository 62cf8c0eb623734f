import type { HandlerName } from '../agent/orchestrator/routing.js';

export interface EvaluationInput {
  query: string;
  response: string;
  handlersUsed: HandlerName[];
  sessionId: string;
}

/**
 * Post-response quality scoring. Runs after the reply is built and must
 * never influence it.
 */
export interface IQualityEvaluator {
  evaluate(input: EvaluationInput): Promise<void>;
}

export class NoopEvaluator implements IQualityEvaluator {
  async evaluate(): Promise<void> {}
}
