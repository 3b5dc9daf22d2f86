import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ProjectEntity, QueuedBuild } from './entities';
import { DatabaseSeedService } from './database-seed.service';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService) => ({
        type: 'postgres',
        url: config.get('DATABASE_URL'),
        entities: [ProjectEntity, QueuedBuild],
        // Only one process should synchronize the database
        synchronize: config.get('SYNC_DATABASE') !== 'false',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSeedService],
})
export class DatabaseModule {}
