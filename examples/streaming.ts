// Streaming example: fire-and-forget query, tokens printed as they arrive

import { createClientFromEnv, statusCallback } from '../src/index.js';

const client = createClientFromEnv();

client.queryAsync(
  [
    { role: 'system', content: 'You explain code briefly.' },
    { role: 'user', content: 'What does `x & (x - 1)` compute?' },
  ],
  statusCallback((event, status) => {
    if (event.type === 'delta') {
      process.stdout.write(event.content);
    } else if (status === 'stop') {
      process.stdout.write(`\n\n[done: ${client.inputTokens} in / ${client.outputTokens} out]\n`);
    } else if (event.type === 'error') {
      console.error(`\n[error] ${event.message}`);
    }
  }),
  { stream: true, modelOptions: { stream_options: { include_usage: true } } },
);

console.log('Query started; results follow.\n');
