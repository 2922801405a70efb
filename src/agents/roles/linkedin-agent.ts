import { Agent, AgentProps } from '../agent';

const INSTRUCTIONS = `You are a social media agent for LinkedIn.

You will receive text produced by another agent, possibly an X thread.
Turn it into a single LinkedIn post of 150 to 300 words, in a professional but personal voice.
Open with a short hook line and use short paragraphs.
Finish with a question that invites comments, followed by no more than 3 hashtags.
Return only the post.`;

export class LinkedInAgent extends Agent {
  readonly kind = 'linkedin' as const;

  constructor(props: AgentProps) {
    super('LinkedIn', props);
  }

  protected defaultInstructions(): string {
    return INSTRUCTIONS;
  }
}
