/**
 * Example MCP Streamable HTTP Client
 *
 * Submits a small evaluation batch, polls until the job finishes, then prints
 * the scored results.
 *
 * Usage:
 *   1. Start the server with Streamable mode:
 *      npm run build
 *      node dist/src/index.js --mcp-transport streamable
 *
 *   2. Run this client:
 *      node dist/examples/streamable-client.js
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';

const POLL_INTERVAL_MS = 2000;

async function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  return {
    isError: result.isError ?? false,
    text: first && first.type === 'text' ? first.text : '',
  };
}

async function main() {
  const serverUrl = process.env.SERVER_URL || 'http://localhost:8000';
  const endpoint = `${serverUrl}/mcp`;

  console.log('🔌 Connecting to MCP server via Streamable HTTP...');
  console.log(`   Server URL: ${endpoint}\n`);

  const transport = new StreamableHTTPClientTransport(new URL(endpoint));
  const client = new Client({
    name: 'streamable-example-client',
    version: '1.0.0',
  });

  try {
    await client.connect(transport);
    console.log('✅ Connected to MCP server!\n');

    const scorers = await callTool(client, 'list-scorers');
    console.log(scorers.text);
    console.log();

    // Step 1: submit
    console.log('📤 Submitting evaluation...');
    const submitted = await callTool(client, 'submit-evaluation', {
      target_url: 'http://localhost:9000/chat',
      idempotency_key: 'example-run-1',
      questions: [
        {
          question: 'What was total revenue last quarter?',
          expected_outcome: {
            response: 'Total revenue was 1.2M',
            agent: 'finance_agent',
            reason: 'Revenue questions go to the finance agent',
          },
        },
        {
          question: 'How many support tickets were opened yesterday?',
          expected_outcome: {
            response: '42 tickets were opened',
            agent: 'support_agent',
            reason: 'Ticket counts go to the support agent',
          },
        },
      ],
    });
    console.log(submitted.text);
    console.log();
    if (submitted.isError) return;

    const jobId = /job(?: submitted)?: (\S+)/.exec(submitted.text.split('\n')[0])?.[1];
    if (!jobId) {
      console.log('❌ No job ID in the response');
      return;
    }

    // Step 2: poll until the job leaves queued/running
    let status = 'queued';
    while (status === 'queued' || status === 'running') {
      await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS));
      const polled = await callTool(client, 'get-evaluation-status', { job_id: jobId });
      status = /: (\w+)$/.exec(polled.text.split('\n')[0])?.[1] ?? 'unknown';
      console.log(`⏳ ${jobId}: ${status}`);
    }
    console.log();

    // Step 3: results
    const results = await callTool(client, 'get-evaluation-results', { job_id: jobId });
    console.log(results.isError ? '❌ Evaluation did not complete:' : '📊 Results:');
    console.log(results.text);
  } catch (error) {
    console.error('❌ Error:', error);
  } finally {
    await client.close();
    console.log('\n👋 Disconnected from server');
  }
}

main().catch(console.error);
