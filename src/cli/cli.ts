#!/usr/bin/env node
/**
 * Azure Cluster Actuator CLI
 * One-shot reconcile/delete of a cluster-api Cluster object
 */

import { program } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Actuator } from '../actuators/cluster/actuator';
import { createAppConfig } from '../config/app-config';
import { createClusterClient } from '../infrastructure/kubernetes/cluster-client';
import { createLogger } from '../lib/logger';
import { runClusterCommand, EXIT_CODES, type ClusterCommand } from './commands';

function packageVersion(): string {
  // src/cli/ when run from sources, dist/src/cli/ once built
  const candidates = [join(__dirname, '../../package.json'), join(__dirname, '../../../package.json')];
  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
        return parsed.version;
      }
    }
  }
  return '0.0.0';
}

interface GlobalOptions {
  namespace?: string;
  logLevel?: string;
  kubeconfig?: string;
}

async function execute(command: ClusterCommand, name: string): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const config = createAppConfig();
  const logger = createLogger({
    name: 'azure-cluster-actuator',
    level: options.logLevel ?? config.server.logLevel,
  });

  const client = createClusterClient(logger, {
    kubeconfig: options.kubeconfig ?? config.kubernetes.kubeconfig,
  });
  const actuator = new Actuator({ client, config, logger });

  process.exitCode = await runClusterCommand(
    command,
    options.namespace ?? config.kubernetes.namespace,
    name,
    {
      actuator,
      client,
      logger,
      write: (output) => process.stdout.write(output),
    },
  );
}

program
  .name('azure-cluster-actuator')
  .description('Reconcile and delete Azure infrastructure for cluster-api clusters')
  .version(packageVersion())
  .option('-n, --namespace <namespace>', 'namespace of the Cluster object (default: CLUSTER_NAMESPACE or "default")')
  .option('--log-level <level>', 'logging level: trace, debug, info, warn, error')
  .option('--kubeconfig <path>', 'kubeconfig of the management cluster (default: KUBECONFIG)')
  .addHelpText(
    'after',
    `

Environment Variables:
  AZURE_SUBSCRIPTION_ID    Subscription that holds the cluster resources
  AZURE_TENANT_ID          Tenant of the service principal
  AZURE_CLIENT_ID          Service principal application id
  AZURE_CLIENT_SECRET      Service principal secret
  LOG_LEVEL                Logging level
`,
  );

const commands: Array<{ command: ClusterCommand; description: string }> = [
  { command: 'reconcile', description: 'create or update the cluster resources' },
  { command: 'delete', description: 'delete the cluster resource group' },
  { command: 'ip', description: 'print the API server address' },
  { command: 'kubeconfig', description: 'print an admin kubeconfig' },
];

for (const { command, description } of commands) {
  program
    .command(`${command} <name>`)
    .description(description)
    .action((name: string) => execute(command, name));
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_CODES.failure;
});
