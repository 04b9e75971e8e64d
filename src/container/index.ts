export { ServiceCollection } from './service-collection.js';
export { ServiceToken } from './service-token.js';
export type {
  ServiceClass,
  ServiceDescriptor,
  ServiceFactory,
  ServiceLifetime,
  ServiceProvider,
  ServiceRegistry,
} from './types.js';
