import { Controller, Get } from '@nestjs/common';
import { StoredRecord } from '../store/interfaces/document-store.interface';
import { OwnerService } from './owner.service';
import { OwnerProfile } from './owner-profile.schema';

/**
 * Endpoints:
 * - GET /api/owners - List owner profiles
 */
@Controller('owners')
export class OwnerController {
  constructor(private readonly ownerService: OwnerService) {}

  @Get()
  async listOwners(): Promise<StoredRecord<OwnerProfile>[]> {
    return this.ownerService.listOwners();
  }
}
