/**
 * @creditops/deploy-client - client for the model hosting service
 */

export * from './DeployClient';
