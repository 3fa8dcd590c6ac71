/**
 * Azure cluster actuator: public API
 */

export { Actuator, ClusterScope, newScope, defaultScopeGetter } from './actuators';
export type { ActuatorParams, ScopeGetter, ScopeParams } from './actuators';
export { Deployer, type DeployerParams } from './deployer/deployer';
export { createAppConfig, type AppConfig } from './config/app-config';
export { REQUEUE_AFTER_MS } from './config/defaults';
export * from './domain/types';
export * from './errors';
export {
  createClusterClient,
  createClusterClientFromApi,
  type ClusterClient,
} from './infrastructure/kubernetes/cluster-client';
export { createArmClient, createClientSecretCredential, type ArmClient } from './infrastructure/azure';
export { defaultServiceFactory, type ServiceFactory } from './services';
export { createLogger, type Logger } from './lib/logger';
