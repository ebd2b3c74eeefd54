import winston from 'winston';
import Transport from 'winston-transport';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_CONFIG } from '../config/default';

const { SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, ENV, LOG_LEVEL } = DEFAULT_CONFIG;

let supabase: SupabaseClient | null = null;

if (ENV !== 'test' && SUPABASE_URL && SUPABASE_SERVICE_ROLE_KEY) {
  supabase = createClient(SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY);
}

/**
 * Forwards critical lines (errors, warnings, lifecycle transitions and
 * redemptions) to the scheme_logs table.
 */
export class SupabaseCriticalTransport extends Transport {
  private client: SupabaseClient;

  constructor(opts: Transport.TransportStreamOptions & { supabaseClient: SupabaseClient }) {
    super(opts);
    this.client = opts.supabaseClient;
  }

  log(info: { level: string; message: string }, callback: () => void) {
    setImmediate(() => {
      this.emit('logged', info);
    });

    const level = info.level;
    const message = info.message;

    const isCritical =
      level === 'error' ||
      level === 'warn' ||
      message.includes('TRANSITION') ||
      message.includes('REDEEM');

    if (isCritical) {
      Promise.resolve(
        this.client.from('scheme_logs').insert({
          action: level,
          details: { message },
          timestamp: new Date().toISOString()
        })
      ).catch((err: unknown) => {
        this.emit('warn', err);
      });
    }

    callback();
  }
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (ENV !== 'test') {
  transports.push(new winston.transports.File({ filename: 'error.log', level: 'error' }));
  transports.push(new winston.transports.File({ filename: 'combined.log' }));
}

if (supabase) {
  transports.push(new SupabaseCriticalTransport({ supabaseClient: supabase }));
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  silent: ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
