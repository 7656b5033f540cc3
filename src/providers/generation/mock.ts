import { ChatMessage, GenerateOptions, GenerationProvider } from '../../types/provider.js';

export const MOCK_RESPONSE = 'This is a mock response from ragrelay.';

/**
 * Offline stand-in used when LLM_MOCK_MODE is set: streams a fixed answer word by word.
 */
export class MockGenerationProvider implements GenerationProvider {
  readonly name = 'mock';
  readonly model = 'mock';

  constructor(private delayMs: number = 0, private response: string = MOCK_RESPONSE) {}

  async *stream(_messages: ChatMessage[], options: GenerateOptions = {}): AsyncGenerator<string> {
    for (const word of this.response.split(' ')) {
      options.signal?.throwIfAborted();
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }
      yield `${word} `;
    }
  }

  async checkHealth(): Promise<boolean> {
    return true;
  }
}
