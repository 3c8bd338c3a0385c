import { errorMessage } from './errors';

/**
 * What a stage records for an item when the judgment call fails or returns
 * something unusable. Each stage exports its own policy so the fallback is a
 * named contract rather than an incidental catch block.
 */
export interface DefaultVerdictPolicy<TInput, TVerdict> {
  readonly description: string;
  fallback(input: TInput, error: unknown): TVerdict;
}

export function describeFailure(error: unknown): string {
  return errorMessage(error).slice(0, 120);
}
