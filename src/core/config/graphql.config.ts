// src/core/config/graphql.config.ts
import { ConfigFactory } from '@nestjs/config';

const graphqlConfig: ConfigFactory = () => {
  const isTest = process.env.NODE_ENV === 'test';
  return {
    graphql: {
      path: process.env.GRAPHQL_PATH || '/graphql',
      // 测试环境只在内存中生成 schema，不落盘
      schemaDestination: isTest ? true : process.env.GRAPHQL_SCHEMA_FILE || 'src/schema.graphql',
      introspection: process.env.GRAPHQL_INTROSPECTION !== 'false',
      sortSchema: true,
    },
  };
};

export default graphqlConfig;
