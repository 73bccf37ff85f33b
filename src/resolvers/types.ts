/**
 * Shared GraphQL Resolver Types
 */

import type { YogaInitialContext } from 'graphql-yoga';
import type { ProvisionerServices } from '../services/bootstrap/index.js';

/** What resolvers read from the request context */
export interface ResolverContext {
  services: ProvisionerServices;
}

export interface Context extends YogaInitialContext, ResolverContext {}
