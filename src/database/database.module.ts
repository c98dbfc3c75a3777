import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const isProduction = config.get<string>('nodeEnv') === 'production';

        return {
          type: 'postgres' as const,
          url: config.getOrThrow<string>('databaseUrl'),
          autoLoadEntities: true,
          synchronize: config.get<boolean>('db.sync') ?? false,
          logging: config.get<boolean>('db.log') ?? false,
          ssl: isProduction ? { rejectUnauthorized: false } : false,
        };
      },
    }),
  ],
})
export class DatabaseModule {}
