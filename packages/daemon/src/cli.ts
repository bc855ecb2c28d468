import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, validateConfig, type DaemonConfig } from './config';
import { Daemon, DAEMON_NAME, DAEMON_VERSION } from './daemon';
import { DaemonError } from './errors';
import { KillSwitch } from './killSwitch';

interface GlobalOptions {
  config?: string;
  vault?: string;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('port must be an integer between 0 and 65535');
  }
  return port;
}

async function resolveConfig(options: GlobalOptions, overrides: Record<string, unknown> = {}): Promise<DaemonConfig> {
  return loadConfig({
    configPath: options.config,
    overrides: options.vault ? { ...overrides, vaultPath: options.vault } : overrides,
  });
}

/** Start the daemon and keep it running until SIGINT or SIGTERM. */
async function runDaemon(config: DaemonConfig): Promise<void> {
  const daemon = new Daemon(config);
  await daemon.start();

  const monitoring = daemon.status().monitoring;
  if (monitoring) {
    console.log(`[daemon] Health: http://${monitoring.host}:${monitoring.port}/health`);
  }

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals) => {
      console.log(`\n[daemon] ${signal} received, shutting down...`);
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      daemon.stop().then(resolve, (err: unknown) => {
        console.error('[daemon] Shutdown failed:', err);
        resolve();
      });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name(DAEMON_NAME)
    .version(DAEMON_VERSION)
    .description('Watches a markdown vault and runs approved automations on changed notes')
    .option('-c, --config <path>', 'YAML configuration file')
    .option('--vault <path>', 'Vault directory (overrides vaultPath)');

  program
    .command('start', { isDefault: true })
    .description('Run the daemon in the foreground')
    .option('-p, --port <port>', 'Monitoring port', parsePort)
    .option('--no-monitoring', 'Do not start the monitoring server')
    .action(async (options: { port?: number; monitoring: boolean }) => {
      const monitoring: Record<string, unknown> = {};
      if (!options.monitoring) monitoring.enabled = false;
      if (options.port !== undefined) monitoring.port = options.port;
      await runDaemon(await resolveConfig(program.opts<GlobalOptions>(), { monitoring }));
    });

  program
    .command('check')
    .description('Validate the configuration and exit')
    .action(async () => {
      const config = await resolveConfig(program.opts<GlobalOptions>());
      const problems = validateConfig(config);
      if (problems.length > 0) {
        throw new DaemonError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
      }
      console.log(`[config] OK: vault ${config.vaultPath}, state ${config.stateDir}`);
    });

  program
    .command('disable')
    .description('Engage the emergency kill switch; running daemons drop all work')
    .argument('[reason...]', 'Why processing is being disabled')
    .action(async (reason: string[]) => {
      const config = await resolveConfig(program.opts<GlobalOptions>());
      const killSwitch = new KillSwitch(config.emergencyMarker);
      await killSwitch.engage(reason.join(' ') || 'disabled by operator');
      console.log(`[killswitch] Engaged: ${config.emergencyMarker}`);
    });

  program
    .command('enable')
    .description('Release the emergency kill switch')
    .action(async () => {
      const config = await resolveConfig(program.opts<GlobalOptions>());
      await new KillSwitch(config.emergencyMarker).release();
      console.log('[killswitch] Released');
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createCLI().parseAsync(argv);
  } catch (error) {
    console.error(`[${DAEMON_NAME}] ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
}
