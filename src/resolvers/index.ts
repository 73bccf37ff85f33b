import { GraphQLScalarType, Kind } from 'graphql';
import { bootstrapMutations, bootstrapQueries } from './bootstrap.js';
import { stackQueries } from './stack.js';
import type { Context, ResolverContext } from './types.js';

export type { Context, ResolverContext };

const DateScalar = new GraphQLScalarType<Date, string>({
  name: 'Date',
  description: 'ISO-8601 timestamp',
  serialize(value) {
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'string') return new Date(value).toISOString();
    throw new TypeError(`Date cannot represent ${String(value)}`);
  },
  parseValue(value) {
    if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) {
      throw new TypeError('Date must be an ISO-8601 string');
    }
    return new Date(value);
  },
  parseLiteral(ast) {
    if (ast.kind !== Kind.STRING || Number.isNaN(Date.parse(ast.value))) {
      throw new TypeError('Date must be an ISO-8601 string');
    }
    return new Date(ast.value);
  },
});

export const resolvers = {
  Date: DateScalar,

  Query: {
    version: () => ({
      commitHash: process.env.COMMIT_HASH || 'dev',
    }),

    ...bootstrapQueries,
    ...stackQueries,
  },

  Mutation: {
    ...bootstrapMutations,
  },
};
