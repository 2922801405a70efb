import { Agent, AgentProps } from '../agent';

const INSTRUCTIONS = `You are a writing agent.

You will receive a search query, and may receive research on its Google results from another agent.
Write a high-quality article on the topic. The article must not read as if it were written by AI.
Optimise it for search engines without compromising its quality.

You are free to be as creative as you wish. However, each paragraph must have:
- The point you are making
- Any follow-up action point
- Why the follow-up action point exists, or why the reader needs to carry it out`;

/**
 * Turns a query, and any research handed to it, into a long-form article.
 */
export class Writer extends Agent {
  readonly kind = 'writer' as const;

  constructor(props: AgentProps) {
    super('Writer', props);
  }

  protected defaultInstructions(): string {
    return INSTRUCTIONS;
  }
}
