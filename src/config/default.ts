import dotenv from 'dotenv';

dotenv.config();

export type DefaultConfig = {
  SUPABASE_URL: string;
  SUPABASE_KEY: string;
  SUPABASE_SERVICE_ROLE_KEY: string;
  SCHEME_TABLE: string;
  SCHEME_EVENT_TABLE: string;
  LOG_LEVEL: string;
  ENV: 'dev' | 'prod' | 'test';
};

const parseEnv = (value: string | undefined): DefaultConfig['ENV'] => {
  if (process.env.NODE_ENV === 'test') return 'test';
  return value === 'prod' ? 'prod' : 'dev';
};

export const DEFAULT_CONFIG: DefaultConfig = {
  SUPABASE_URL: process.env.SUPABASE_URL || "",
  SUPABASE_KEY: process.env.SUPABASE_KEY || "",
  SUPABASE_SERVICE_ROLE_KEY: process.env.SUPABASE_SERVICE_ROLE_KEY || "",
  SCHEME_TABLE: process.env.SCHEME_TABLE || "schemes",
  SCHEME_EVENT_TABLE: process.env.SCHEME_EVENT_TABLE || "scheme_events",
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
  ENV: parseEnv(process.env.ENV),
};
