import 'dotenv/config';
import {
  Agent,
  AgentFactory,
  ContentPipeline,
  DEFAULT_AGENT_KINDS,
  OpenAIProvider,
  PipelineHooks,
  SerperSearchBackend,
} from '../../src/agents';
import { loadConfig } from '../../src/config';
import { Printer } from './printer';

class ProgressHooks extends PipelineHooks {
  constructor(private readonly printer: Printer) {
    super();
  }

  async onAgentStart(agent: Agent, _input: string, index: number): Promise<void> {
    this.printer.updateItem(`stage-${index}`, `${agent.name} is working...`);
  }

  async onAgentEnd(agent: Agent, output: string, index: number): Promise<void> {
    this.printer.markItemDone(`stage-${index}`, `${agent.name} done (${output.length} characters)`);
  }
}

async function main(): Promise<void> {
  const query = process.argv.slice(2).join(' ') || 'How are small cafes using loyalty apps?';
  const config = loadConfig();

  const model = new OpenAIProvider({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    defaultModel: config.model,
  }).getModel();
  const searchBackend = new SerperSearchBackend({
    apiKey: config.serperApiKey,
    endpoint: config.searchEndpoint,
  });

  const printer = new Printer();
  const pipeline = new ContentPipeline(
    new AgentFactory({ model, searchBackend }).createMany(DEFAULT_AGENT_KINDS),
    { hooks: new ProgressHooks(printer), tracingDisabled: config.tracingDisabled }
  );

  const result = await pipeline.runPipeline(query);
  printer.end();

  console.log('\n\n=====RESULT=====\n\n');
  console.log(result);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
