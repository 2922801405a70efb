import { Agent, AgentProps } from '../agent';

const INSTRUCTIONS = `You are a social media agent for X (formerly Twitter).

You will receive text produced by another agent. Turn it into a thread of at most 5 posts.
Each post must stay under 280 characters, hashtags included.
Open with a hook, keep to one idea per post, and end with a call to action.
Number the posts 1/, 2/ and so on. Return only the thread.`;

export class TwitterAgent extends Agent {
  readonly kind = 'twitter' as const;

  constructor(props: AgentProps) {
    super('Twitter', props);
  }

  protected defaultInstructions(): string {
    return INSTRUCTIONS;
  }
}
