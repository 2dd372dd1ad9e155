import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, version, type AppConfig } from './config';
import { createApp } from './app';
import { createMcpServer, SERVER_NAME } from './server';
import { createPrinterClient } from './services/printer-client.service';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

interface CliOptions {
  readonly transport?: string;
  readonly port?: string;
  readonly host?: string;
  readonly ak?: string;
  readonly did?: string;
}

const program = new Command()
  .name('memobird-print-bridge')
  .description('Expose a Memobird printer as callable tools')
  .version(version)
  .option('-t, --transport <transport>', 'stdio or http (env MCP_TRANSPORT)')
  .option('-p, --port <port>', 'port for the http transport (env PORT)')
  .option('--host <host>', 'host for the http transport (env HOST)')
  .option('--ak <key>', 'Memobird API key (env MEMOBIRD_AK)')
  .option('--did <id>', 'Memobird device ID (env MEMOBIRD_DEVICE_ID)');

async function startStdio(config: AppConfig): Promise<void> {
  const client = createPrinterClient(config);
  const server = createMcpServer(client);
  await server.connect(new StdioServerTransport());
  logger.info({ deviceId: config.deviceId }, `${SERVER_NAME} listening on stdio`);
}

function startHttp(config: AppConfig): void {
  const app = createApp(createPrinterClient(config));
  app.listen(config.port, config.host, () => {
    logger.info({ port: config.port, host: config.host, deviceId: config.deviceId }, `${SERVER_NAME} started`);
    logger.info(`MCP endpoint: http://${config.host}:${config.port}/mcp`);
  });
}

async function main(): Promise<void> {
  program.parse(process.argv);
  const options = program.opts<CliOptions>();

  const config = loadConfig(process.env, {
    apiKey: options.ak,
    deviceId: options.did,
    transport: options.transport,
    port: options.port,
    host: options.host,
  });

  if (config.transport === 'http') {
    startHttp(config);
  } else {
    await startStdio(config);
  }
}

main().catch((error) => {
  logger.fatal({ error: errorMessage(error) }, 'Failed to start');
  process.exitCode = 1;
});
