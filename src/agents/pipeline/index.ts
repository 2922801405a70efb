import type { Agent } from '../agent';
import { PipelineHooks } from '../lifecycle';
import { logger } from '../logger';
import { agentSpan, trace, withSpan, withTrace } from '../tracing';

export const DEFAULT_WORKFLOW_NAME = 'Content pipeline';

export interface PipelineOptions {
  /** Name of the trace recorded for each run */
  workflowName?: string;
  /** Attached to the trace of each run */
  traceMetadata?: Record<string, string>;
  /** Groups the traces of related runs, e.g. by request id */
  groupId?: string;
  /** Skip tracing for this pipeline's runs */
  tracingDisabled?: boolean;
  /** Callbacks around each stage */
  hooks?: PipelineHooks;
}

/**
 * Runs an ordered list of agents as a left-to-right fold over one string: each agent's output is
 * the next agent's instruction. The first failure rejects the run and no later stage starts.
 */
export abstract class Pipeline {
  protected readonly options: PipelineOptions;
  private readonly hooks: PipelineHooks;

  constructor(options: PipelineOptions = {}) {
    this.options = options;
    this.hooks = options.hooks ?? new PipelineHooks();
  }

  /**
   * The agents for one run, in execution order.
   */
  abstract initAgents(): readonly Agent[];

  /**
   * Thread the input through every agent. An empty agent list returns the input unchanged.
   */
  async runPipeline(initialInput: string): Promise<string> {
    const agents = this.initAgents();
    const runTrace = trace(this.options.workflowName ?? DEFAULT_WORKFLOW_NAME, {
      groupId: this.options.groupId,
      metadata: this.options.traceMetadata,
      disabled: this.options.tracingDisabled,
    });

    return withTrace(runTrace, async () => {
      logger.debug(
        `Running pipeline with ${agents.length} agent(s): ${agents.map((agent) => agent.name).join(', ')}`
      );

      let currentOutput = initialInput;
      for (const [index, agent] of agents.entries()) {
        currentOutput = await this.runStage(agent, currentOutput, index);
      }
      return currentOutput;
    });
  }

  private async runStage(agent: Agent, input: string, index: number): Promise<string> {
    const span = agentSpan(agent.name, agent.kind, index, this.options.tracingDisabled);

    return withSpan(span, async () => {
      await this.hooks.onAgentStart(agent, input, index);
      let output: string;
      try {
        // The pipeline forwards no context between stages
        output = await agent.transform(input, '');
      } catch (error) {
        logger.error(`Agent ${agent.name} failed at stage ${index}: ${String(error)}`);
        throw error;
      }
      await this.hooks.onAgentEnd(agent, output, index);
      return output;
    });
  }
}

/**
 * A pipeline over a fixed agent list.
 */
export class ContentPipeline extends Pipeline {
  private readonly agents: readonly Agent[];

  constructor(agents: readonly Agent[], options: PipelineOptions = {}) {
    super(options);
    this.agents = [...agents];
  }

  initAgents(): readonly Agent[] {
    return this.agents;
  }
}
