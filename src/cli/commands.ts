/**
 * CLI command handlers
 *
 * Each command loads one Cluster object and hands it to the actuator. Exit codes:
 * 0 on success, 2 when the actuator asks for a requeue, 1 on any other failure.
 */

import type { Logger } from 'pino';
import type { Actuator } from '../actuators/cluster/actuator';
import { isApplicationError, isRequeueAfterError, toError } from '../errors';
import type { ClusterClient } from '../infrastructure/kubernetes/cluster-client';

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  requeue: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type ClusterCommand = 'reconcile' | 'delete' | 'ip' | 'kubeconfig';

export interface CommandContext {
  actuator: Pick<Actuator, 'reconcile' | 'delete' | 'getIP' | 'getKubeConfig'>;
  client: ClusterClient;
  logger: Logger;
  write: (output: string) => void;
}

export async function runClusterCommand(
  command: ClusterCommand,
  namespace: string,
  name: string,
  context: CommandContext,
): Promise<ExitCode> {
  const { actuator, client, logger, write } = context;

  try {
    const cluster = await client.getCluster(namespace, name);

    switch (command) {
      case 'reconcile':
        await actuator.reconcile(cluster);
        logger.info({ cluster: name }, 'Cluster reconciled');
        break;
      case 'delete':
        await actuator.delete(cluster);
        logger.info({ cluster: name }, 'Cluster deleted');
        break;
      case 'ip':
        write(`${await actuator.getIP(cluster)}\n`);
        break;
      case 'kubeconfig':
        write(await actuator.getKubeConfig(cluster));
        break;
    }

    return EXIT_CODES.success;
  } catch (error) {
    if (isRequeueAfterError(error)) {
      logger.warn(
        { cluster: name, requeueAfterMs: error.requeueAfterMs, cause: error.cause?.message },
        `${command} of cluster ${name} must be retried: ${error.message}`,
      );
      return EXIT_CODES.requeue;
    }

    const cause = toError(error);
    logger.error(
      { cluster: name, code: isApplicationError(error) ? error.code : undefined, error: cause.message },
      `${command} of cluster ${name} failed`,
    );
    return EXIT_CODES.failure;
  }
}
