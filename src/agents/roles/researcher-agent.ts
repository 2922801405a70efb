import { Agent, AgentContext, AgentProps } from '../agent';
import { SerializationError, describeError } from '../exceptions';
import type { SearchBackend } from '../search/interface';

const INSTRUCTIONS = `You are a research agent.

You will receive a question that may be short or come with little context.
Research it and answer with a high-quality summary, assisted by the provided context.
The provided context is JSON and holds the first Google results for the website or query.

Be concise.`;

export interface ResearcherProps extends AgentProps {
  /** Where search results for the question come from */
  searchBackend: SearchBackend;
}

/**
 * Answers a question from live search results. Without an explicit context, each transform call
 * searches for the instruction first and uses the results as its own context only.
 */
export class Researcher extends Agent {
  readonly kind = 'researcher' as const;

  private readonly searchBackend: SearchBackend;

  constructor({ searchBackend, ...props }: ResearcherProps) {
    super('Researcher', props);
    this.searchBackend = searchBackend;
  }

  protected defaultInstructions(): string {
    return INSTRUCTIONS;
  }

  /**
   * Search for the raw query and return the response body as pretty-printed JSON.
   */
  async gatherContext(query: string): Promise<string> {
    const body = await this.searchBackend.search(query);
    let encoded: string | undefined;
    try {
      encoded = JSON.stringify(body, null, 2);
    } catch (error) {
      throw new SerializationError(`Search response could not be encoded: ${describeError(error)}`, {
        source: 'response',
        cause: error,
      });
    }
    // undefined when the body itself was undefined
    return encoded ?? 'null';
  }

  async transform(instruction: string, context: AgentContext = ''): Promise<string> {
    // Blank context counts as none
    const isBlank = typeof context === 'string' && context.trim() === '';
    const ownContext = isBlank ? await this.gatherContext(instruction) : context;
    return super.transform(instruction, ownContext);
  }
}
