import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import type {
  PushCommit,
  PushNotification,
  PushPusher,
  PushRepository,
} from '../trigger/push-notification';

class PushRepositoryDto implements PushRepository {
  @ApiProperty({ example: 'https://gitbucket.example.com/example/frontend-app.git' })
  url!: string;
}

class PushPusherDto implements PushPusher {
  @ApiProperty({ example: 'alice' })
  name!: string;
}

class PushCommitDto implements PushCommit {
  @ApiProperty({ example: 'deadbeef' })
  id!: string;

  @ApiProperty({ example: 'fix bug' })
  message!: string;
}

/**
 * Push notification as produced by the webhook parser. Not validated here.
 */
export class PushNotificationDto implements PushNotification {
  @ApiPropertyOptional({ type: PushRepositoryDto, nullable: true })
  repository!: PushRepositoryDto | null;

  @ApiProperty({ example: 'refs/heads/main' })
  ref!: string;

  @ApiPropertyOptional({ type: PushPusherDto, nullable: true })
  pusher!: PushPusherDto | null;

  @ApiPropertyOptional({ type: PushCommitDto, nullable: true })
  lastCommit!: PushCommitDto | null;

  @ApiPropertyOptional({ type: [PushCommitDto] })
  commits?: PushCommitDto[];
}

/** Fills in absent optional fields so the dispatcher always sees nulls, never undefined. */
export function toPushNotification(body: Partial<PushNotificationDto>): PushNotification {
  return {
    repository: body.repository ?? null,
    ref: body.ref ?? '',
    pusher: body.pusher ?? null,
    lastCommit: body.lastCommit ?? null,
    commits: body.commits ?? [],
  };
}
