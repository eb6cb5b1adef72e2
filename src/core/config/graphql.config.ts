// src/core/config/graphql.config.ts

const graphqlConfig = () => ({
  graphql: {
    // 测试环境只在内存中生成 schema，不写文件
    schemaDestination: process.env.NODE_ENV === 'test' ? true : 'src/schema.graphql',
    introspection: process.env.NODE_ENV !== 'production',
    playground: false,
    sortSchema: true,
  },
});

export default graphqlConfig;
