export { createArmClient, ArmResourceSchema, type ArmClient, type ArmResource, type ArmClientOptions } from './arm-client';
export { createClientSecretCredential, type TokenCredential, type CredentialOptions } from './credentials';
export { defaultFetch, type HttpFetch, type HttpRequest, type HttpResponse } from './http';
export * from './resource-ids';
