/**
 * Base abstract class for span data
 */
export abstract class SpanData {
  /**
   * Export span data as a plain object
   */
  abstract export(): Record<string, unknown>;

  /**
   * Type of the span data
   */
  abstract get type(): string;
}

/**
 * Span data for one agent stage of a pipeline run
 */
export class AgentSpanData extends SpanData {
  constructor(
    public name: string,
    public kind: string | null = null,
    public stage: number | null = null
  ) {
    super();
  }

  get type(): string {
    return 'agent';
  }

  export(): Record<string, unknown> {
    return {
      type: this.type,
      name: this.name,
      kind: this.kind,
      stage: this.stage,
    };
  }
}

/**
 * Span data for a completion call
 */
export class GenerationSpanData extends SpanData {
  constructor(
    public input: Array<Record<string, string>> | null = null,
    public output: Array<string | null> | null = null,
    public model: string | null = null,
    public usage: Record<string, number> | null = null
  ) {
    super();
  }

  get type(): string {
    return 'generation';
  }

  export(): Record<string, unknown> {
    return {
      type: this.type,
      input: this.input,
      output: this.output,
      model: this.model,
      usage: this.usage,
    };
  }
}

/**
 * Span data for a search backend call
 */
export class SearchSpanData extends SpanData {
  constructor(
    public query: string | null,
    public endpoint: string | null = null
  ) {
    super();
  }

  get type(): string {
    return 'search';
  }

  export(): Record<string, unknown> {
    return {
      type: this.type,
      query: this.query,
      endpoint: this.endpoint,
    };
  }
}
