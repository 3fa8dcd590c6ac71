/**
 * Cluster Actuator
 *
 * Implements the reconcile/delete contract the cluster controller calls for
 * every Cluster object. Each call gets its own scope and runs its steps one
 * after another; the first failing step ends the call.
 *
 * @example
 * ```typescript
 * const actuator = new Actuator({ client: createClusterClient(logger), logger });
 * try {
 *   await actuator.reconcile(cluster);
 * } catch (error) {
 *   if (isRequeueAfterError(error)) schedule(error.requeueAfterMs);
 * }
 * ```
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../../config/app-config';
import { REQUEUE_AFTER_MS } from '../../config/defaults';
import { isFail, type Cluster } from '../../domain/types';
import { ActuatorError, RequeueAfterError, toError } from '../../errors';
import { Deployer } from '../../deployer/deployer';
import type { ClusterClient } from '../../infrastructure/kubernetes/cluster-client';
import { defaultServiceFactory, type ServiceFactory } from '../../services';
import type { ClusterScope } from '../scope';
import { defaultScopeGetter, type ScopeGetter } from '../scope-getter';

export interface ActuatorParams {
  client: ClusterClient;
  scopeGetter?: ScopeGetter;
  services?: ServiceFactory;
  config?: AppConfig;
  logger?: Logger;
}

/**
 * One reconciliation step; `message` prefixes the error when it fails
 */
interface Step {
  name: string;
  message: string;
  run: () => Promise<void>;
}

export class Actuator extends Deployer {
  private readonly client: ClusterClient;
  private readonly services: ServiceFactory;

  constructor(params: ActuatorParams) {
    super({
      scopeGetter: params.scopeGetter ?? defaultScopeGetter,
      config: params.config,
      logger: params.logger,
    });
    this.client = params.client;
    this.services = params.services ?? defaultServiceFactory;
  }

  /**
   * Drive the cluster's Azure resources toward its spec
   */
  async reconcile(cluster: Cluster): Promise<void> {
    const name = cluster.metadata.name;
    this.logger.info({ cluster: name }, `Reconciling cluster ${name}`);

    await this.withScope(cluster, async (scope) => {
      const certificates = this.services.certificates(scope);
      const resources = this.services.resources(scope);
      const network = this.services.network(scope);

      const steps: Step[] = [
        {
          name: 'certificates',
          message: `failed to reconcile certificates for cluster "${name}"`,
          run: () => certificates.reconcileCertificates(),
        },
        {
          name: 'resource-group',
          message: `failed to reconcile resource group for cluster "${name}"`,
          run: () => resources.reconcileResourceGroup(),
        },
        {
          name: 'network',
          message: `failed to reconcile network for cluster "${name}"`,
          run: () => network.reconcileNetwork(),
        },
        {
          name: 'load-balancer',
          message: `failed to reconcile load balancers for cluster "${name}"`,
          run: () => network.reconcileLoadBalancer('api'),
        },
      ];

      await this.runSteps(name, steps);
    });
  }

  /**
   * Tear down the cluster's Azure resources. Failures ask the controller to retry later.
   */
  async delete(cluster: Cluster): Promise<void> {
    const name = cluster.metadata.name;
    this.logger.info({ cluster: name }, `Deleting cluster ${name}`);

    await this.withScope(cluster, async (scope) => {
      const resources = this.services.resources(scope);

      try {
        await resources.deleteResourceGroup();
      } catch (error) {
        const cause = toError(error);
        this.logger.error(
          { cluster: name, error: cause.message },
          `Error deleting resource group: ${cause.message}`,
        );
        throw new RequeueAfterError(REQUEUE_AFTER_MS, cause, { clusterName: name });
      }
    });
  }

  private async runSteps(clusterName: string, steps: Step[]): Promise<void> {
    for (const step of steps) {
      try {
        await step.run();
      } catch (error) {
        throw new ActuatorError(step.message, clusterName, step.name, toError(error));
      }
    }
  }

  /**
   * Acquire a scope for the call and release it on every exit path
   */
  private async withScope(
    cluster: Cluster,
    fn: (scope: ClusterScope) => Promise<void>,
  ): Promise<void> {
    const result = this.scopeGetter.getScope({
      cluster,
      client: this.client,
      logger: this.logger,
      ...(this.config && { config: this.config }),
    });

    if (isFail(result)) {
      throw new ActuatorError('failed to create scope', cluster.metadata.name, 'scope', result.error);
    }

    const scope = result.value;
    try {
      await fn(scope);
    } finally {
      await scope.close();
    }
  }
}
