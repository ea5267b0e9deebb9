export type DataSourceType = 'csv' | 'database';

function parseDataSourceType(value: string | undefined): DataSourceType {
  return value === 'database' ? 'database' : 'csv';
}

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '8000', 10),
  host: process.env.HOST || '0.0.0.0',
  serviceName: process.env.SERVICE_NAME || 'commerce-analytics-service',
  version: process.env.SERVICE_VERSION || '1.0.0',
  dataSource: {
    type: parseDataSourceType(process.env.DATA_SOURCE),
    csvPath: process.env.DATA_PATH || './data/raw',
  },
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'commerce_analytics',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    pool: {
      min: parseInt(process.env.DB_POOL_MIN || '2', 10),
      max: parseInt(process.env.DB_POOL_MAX || '10', 10),
    },
  },
  analytics: {
    atRiskDays: parseInt(process.env.CHURN_AT_RISK_DAYS || '60', 10),
    churnDays: parseInt(process.env.CHURN_DAYS || '90', 10),
  },
  http: {
    allowedOrigins: process.env.ALLOWED_ORIGINS?.split(',') || ['*'],
    rateLimitMax: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
    rateLimitWindow: process.env.RATE_LIMIT_WINDOW || '1 minute',
  },
};

export type AppConfig = typeof config;
