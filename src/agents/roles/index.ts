import type { AgentKind } from '../agent';
import type { Model } from '../models/interface';
import type { SearchBackend } from '../search/interface';
import { LinkedInAgent } from './linkedin-agent';
import { Researcher } from './researcher-agent';
import { TwitterAgent } from './twitter-agent';
import { Writer } from './writer-agent';

export { LinkedInAgent } from './linkedin-agent';
export { Researcher } from './researcher-agent';
export type { ResearcherProps } from './researcher-agent';
export { TwitterAgent } from './twitter-agent';
export { Writer } from './writer-agent';

/**
 * The concrete class behind each agent kind.
 */
export interface AgentsByKind {
  researcher: Researcher;
  writer: Writer;
  twitter: TwitterAgent;
  linkedin: LinkedInAgent;
}

export type AnyAgent = AgentsByKind[AgentKind];

/**
 * The chain a prompt request runs when it names no agents: research the query, condense it into
 * an X thread, then rework the thread into a LinkedIn post.
 */
export const DEFAULT_AGENT_KINDS: readonly AgentKind[] = ['researcher', 'twitter', 'linkedin'];

export interface AgentFactoryOptions {
  /** Shared by every agent the factory creates */
  model: Model;
  /** Used by researchers */
  searchBackend: SearchBackend;
  /** Per-kind system prompt overrides */
  instructions?: Partial<Record<AgentKind, string>>;
}

/**
 * Builds agents by kind over one set of backends.
 */
export class AgentFactory {
  private readonly builders: { [K in AgentKind]: () => AgentsByKind[K] };

  constructor({ model, searchBackend, instructions = {} }: AgentFactoryOptions) {
    this.builders = {
      researcher: () =>
        new Researcher({ model, searchBackend, instructions: instructions.researcher }),
      writer: () => new Writer({ model, instructions: instructions.writer }),
      twitter: () => new TwitterAgent({ model, instructions: instructions.twitter }),
      linkedin: () => new LinkedInAgent({ model, instructions: instructions.linkedin }),
    };
  }

  create<K extends AgentKind>(kind: K): AgentsByKind[K] {
    return this.builders[kind]();
  }

  /**
   * Create one agent per kind, in the given order. Repeated kinds give separate agents.
   */
  createMany(kinds: readonly AgentKind[]): AnyAgent[] {
    return kinds.map((kind) => this.create(kind));
  }
}
