import type { Agent } from './agent';

/**
 * Receives callbacks as a pipeline run moves through its stages. Subclass and override the methods
 * you need; each callback is awaited before the run continues.
 */
export class PipelineHooks {
  /**
   * Called before an agent's transform is invoked.
   */
  async onAgentStart(_agent: Agent, _input: string, _index: number): Promise<void> {
    // Default implementation does nothing
  }

  /**
   * Called after an agent's transform resolves.
   */
  async onAgentEnd(_agent: Agent, _output: string, _index: number): Promise<void> {
    // Default implementation does nothing
  }
}
