export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  corsOrigin: string[] | true;
  apiTitle: string;
  apiVersion: string;
  apiDescription: string;
  apiBaseUrl: string;
  defaultResultLimit: number;
}

const parseInteger = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInteger(env.PORT, 3000);
  const host = env.HOST || '0.0.0.0';
  const defaultResultLimit = parseInteger(env.DEFAULT_RESULT_LIMIT, 5);

  return {
    port,
    host,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    corsOrigin: env.CORS_ORIGIN
      ? env.CORS_ORIGIN.split(',').map((origin) => origin.trim())
      : true,
    apiTitle: env.API_TITLE || 'Storefront API',
    apiVersion: env.API_VERSION || '1.0.0',
    apiDescription:
      env.API_DESCRIPTION ||
      'In-memory e-commerce API with cart, checkout, order history and product recommendations',
    apiBaseUrl: env.API_BASE_URL || `http://${host}:${port}`,
    defaultResultLimit: defaultResultLimit > 0 ? defaultResultLimit : 5,
  };
}
