export { Actuator, type ActuatorParams } from './cluster/actuator';
export { ClusterScope, newScope, type ScopeParams } from './scope';
export { defaultScopeGetter, type ScopeGetter } from './scope-getter';
