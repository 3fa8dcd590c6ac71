/**
 * Scope getter: how the actuator and deployer obtain a scope for a cluster
 */

import type { Result } from '../domain/types';
import type { ScopeError } from '../errors';
import { newScope, type ClusterScope, type ScopeParams } from './scope';

export interface ScopeGetter {
  getScope: (params: ScopeParams) => Result<ClusterScope, ScopeError>;
}

export const defaultScopeGetter: ScopeGetter = {
  getScope: (params) => newScope(params),
};
