// Basic usage example: one buffered completion, then the running token counters

import { ConsoleLoggerFactory, OpenAICompatibleProvider, eventCallback, loadSettingsFromEnv } from '../src/index.js';

async function main() {
  const settings = loadSettingsFromEnv();

  if (!OpenAICompatibleProvider.isConfiguredProperly(settings)) {
    console.log(`Set OPENAI_COMPATIBLE_API_KEY to try ${OpenAICompatibleProvider.getMenuName(settings)}.`);
    return;
  }

  const [model] = OpenAICompatibleProvider.supportedModels(settings);
  const client = OpenAICompatibleProvider.createClient(model, settings, {
    logger: new ConsoleLoggerFactory('info').createLogger('example'),
  });

  console.log(`Querying ${client} at ${client.url}\n`);

  await client.query(
    'What is 2 + 2? Answer with just the number.',
    eventCallback((event) => {
      if (event.type === 'response') {
        const { role, content } = event.message;
        console.log(`   ✓ ${String(role)}: ${typeof content === 'string' ? content : JSON.stringify(content)}`);
      } else if (event.type === 'error') {
        console.log(`   ✗ Error: ${event.message}`);
      }
    }),
    { modelOptions: { temperature: 0, max_tokens: 16 } },
  );

  console.log(`\nTokens so far: ${client.inputTokens} in / ${client.outputTokens} out`);
}

main().catch(console.error);
