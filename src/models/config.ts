export interface Config {
  key: string;
  value: string;
}

export const CONFIG_KEYS = {
  LLM_API_KEY: 'llm_api_key',
  LLM_BASE_URL: 'llm_base_url',
  LLM_MODEL: 'llm_model',
  RAINDROP_TOKEN: 'raindrop_token',
  PROXY_URL: 'proxy_url',
  RETENTION_DAYS: 'retention_days',
  REFRESH_CONCURRENCY: 'refresh_concurrency',
  LOG_FILE: 'log_file',
} as const;

export type ConfigKey = (typeof CONFIG_KEYS)[keyof typeof CONFIG_KEYS];
