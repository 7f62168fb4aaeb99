import { createGateway } from './gateway.js';
import { loadConfig } from './loadConfig.js';
import { createLogger } from './logger.js';
import { SpawnProcessRunner } from './processRunner.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger();
  const gateway = createGateway(config, logger, { runner: new SpawnProcessRunner() });

  await gateway.start();
  logger.info({
    level: 'info',
    message: 'CGI gateway started',
    metadata: { host: config.gateway.host, port: config.gateway.port, configPath: config.configPath }
  });
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Failed to start CGI gateway', error);
    process.exit(1);
  });
}
