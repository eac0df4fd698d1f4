import { Controller, Get, Param } from '@nestjs/common';
import { StoredRecord } from '../store/interfaces/document-store.interface';
import { VideoService } from './video.service';
import { Video } from './video.schema';

/**
 * VideoController serves the website's background video
 *
 * Endpoints:
 * - GET /api/video/current - Video for the current month, or the latest one
 * - GET /api/video/:month_key - Video for an exact month (YYYY-MM)
 *
 * Both answer with an empty body when nothing matches, including a
 * month_key that is not formatted as YYYY-MM.
 */
@Controller('video')
export class VideoController {
  constructor(private readonly videoService: VideoService) {}

  @Get('current')
  async getCurrentVideo(): Promise<StoredRecord<Video> | null> {
    return this.videoService.getCurrentVideo();
  }

  @Get(':month_key')
  async getVideoByMonth(
    @Param('month_key') monthKey: string,
  ): Promise<StoredRecord<Video> | null> {
    return this.videoService.getVideoByMonth(monthKey);
  }
}
