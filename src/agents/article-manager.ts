import { logger } from './logger';
import type { Researcher, Writer } from './roles';
import { agentSpan, trace, withSpan, withTrace } from './tracing';

export interface ArticleResult {
  /** The researcher's summary of the search results */
  research: string;
  /** The article written from the query and the research */
  article: string;
}

/**
 * Research a query, then write an article from it. Unlike a pipeline, the writer receives the
 * original query as its instruction and the research as its context.
 */
export class ArticleManager {
  private readonly researcher: Researcher;
  private readonly writer: Writer;
  private readonly tracingDisabled: boolean;

  constructor({
    researcher,
    writer,
    tracingDisabled = false,
  }: {
    researcher: Researcher;
    writer: Writer;
    tracingDisabled?: boolean;
  }) {
    this.researcher = researcher;
    this.writer = writer;
    this.tracingDisabled = tracingDisabled;
  }

  async writeArticle(query: string): Promise<ArticleResult> {
    const articleTrace = trace('Article', { disabled: this.tracingDisabled });

    return withTrace(articleTrace, async () => {
      const research = await withSpan(
        agentSpan(this.researcher.name, this.researcher.kind, 0),
        () => this.researcher.transform(query)
      );
      logger.debug(`Research complete (${research.length} characters), writing article`);

      const article = await withSpan(agentSpan(this.writer.name, this.writer.kind, 1), () =>
        this.writer.transform(query, research)
      );

      return { research, article };
    });
  }
}
