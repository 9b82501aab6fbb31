import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE =
  '{"evaluation":"","memory":"","nextGoal":"finish","actions":[{"type":"done","success":false,"text":"mock provider has no scripted answer"}]}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  withImage: boolean;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for tests and dry runs.
 * Replays canned responses in order, then falls back to a `done` answer.
 */
export function createMockClient(
  responses?: readonly string[],
): MockLLMClient {
  const calls: MockCall[] = [];

  const answer = (call: MockCall): Promise<string> => {
    const response = responses?.[calls.length] ?? DEFAULT_RESPONSE;
    calls.push(call);
    return Promise.resolve(response);
  };

  return {
    calls,

    generate(systemPrompt: string, userPrompt: string): Promise<string> {
      return answer({ systemPrompt, userPrompt, withImage: false });
    },

    generateWithImage(
      systemPrompt: string,
      userPrompt: string,
      _imageBase64: string,
      _mimeType: string,
    ): Promise<string> {
      return answer({ systemPrompt, userPrompt, withImage: true });
    },
  };
}
