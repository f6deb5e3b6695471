import type {
  CallOpts,
  CritiqueAdapter,
  CritiqueCompletionArgs,
  CritiqueCompletionResult,
} from "../../src/adapters/llm/types.js";

export interface FakeAdapterCall {
  args: CritiqueCompletionArgs;
  opts: CallOpts;
}

/**
 * In-process stand-in for the external model: replies with fixed content or
 * fails with a fixed error, and records every call.
 */
export class FakeCritiqueAdapter implements CritiqueAdapter {
  readonly name = "fake";
  readonly model = "fake-model";
  readonly calls: FakeAdapterCall[] = [];

  constructor(private readonly behaviour: { content: string } | { error: Error }) {}

  async complete(args: CritiqueCompletionArgs, opts: CallOpts): Promise<CritiqueCompletionResult> {
    this.calls.push({ args, opts });
    if ("error" in this.behaviour) {
      throw this.behaviour.error;
    }
    return { content: this.behaviour.content, usage: { input_tokens: 12, output_tokens: 34 } };
  }
}

export const LAUNCH_DECISION =
  "We should launch Product X in 3 months; it's a no-brainer and will capture market share quickly. Let's push marketing spend ASAP and scale integrations.";

export const LAUNCH_CONTEXT = "Budget limited to $500k; growth is the priority.";
