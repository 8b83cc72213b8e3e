export * from './deployment/config';
export * from './deployment/errors';
export * from './deployment/logger';
export * from './deployment/executor';
export { detectPlatform } from './deployment/analyzer';
export * from './deployment/builder';
export * from './deployment/manifest';
export { dotnetBuilder } from './deployment/dotnet';
export { nodeBuilder } from './deployment/node';
export { pythonBuilder } from './deployment/python';
export { convertEnvToAppSettings } from './deployment/env';
export { createDeploymentPackage } from './deployment/package';
export * from './deployment/deploy';
