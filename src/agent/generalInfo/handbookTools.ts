import { z } from 'zod';
import type { AppError } from '../../errors/AppError.js';
import { withTimeout } from '../../http/timeout.js';
import { executeHandbookRetrieval } from '../../retrieval/handbookRetrieval.js';
import type { IVectorStore } from '../../retrieval/types.js';
import {
  defineTool,
  parseToolArguments,
  type ToolContext,
  type ToolOutcome,
  type ToolRegistry,
} from '../tools.js';

export const retrieveHandbookInfoSchema = z.object({
  query: z.string().min(1).describe('The policy or FAQ question to look up'),
  k: z.coerce.number().int().min(1).max(10).default(3).describe('Number of handbook passages to return'),
});

export type HandbookToolCall = {
  name: 'retrieve_handbook_info';
  args: z.output<typeof retrieveHandbookInfoSchema>;
};

export interface HandbookToolDependencies {
  vectorStore: IVectorStore;
  handbookCollection: string;
  searchTimeoutMs: number;
}

export function createHandbookToolRegistry(deps: HandbookToolDependencies): ToolRegistry<HandbookToolCall> {
  return {
    definitions: [
      defineTool(
        'retrieve_handbook_info',
        'Search the company handbook for policies, FAQs, shipping, returns and company information.',
        retrieveHandbookInfoSchema
      ),
    ],

    parse(name: string, rawArgs: string): HandbookToolCall | null {
      if (name !== 'retrieve_handbook_info') {
        return null;
      }
      return { name, args: parseToolArguments(name, rawArgs, retrieveHandbookInfoSchema) };
    },

    async execute(call: HandbookToolCall, context: ToolContext): Promise<ToolOutcome> {
      const result = await withTimeout(
        () => executeHandbookRetrieval(
          deps.vectorStore,
          deps.handbookCollection,
          call.args.query,
          call.args.k,
          context.minSimilarity
        ),
        deps.searchTimeoutMs,
        call.name
      );
      return { output: result.text, sources: result.sources };
    },

    describeFailure(_call: HandbookToolCall, error: AppError): string {
      if (error.isTimeout) {
        return 'Error: Handbook search timed out. Please try again.';
      }
      return `Error: Handbook search failed. ${error.safeMessage}`;
    },
  };
}
