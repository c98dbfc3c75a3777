import { validateEnv } from './env.schema';

export type AppConfig = ReturnType<typeof configuration>;

export default function configuration() {
  const env = validateEnv(process.env);

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    databaseUrl: env.DATABASE_URL,
    db: {
      sync: env.DB_SYNC,
      log: env.DB_LOG,
    },
    jwt: {
      secret: env.JWT_SECRET,
      expiresIn: env.JWT_EXPIRES_IN,
    },
    booking: {
      timezone: env.BOOKING_TIMEZONE,
    },
  };
}
