import { Controller, Get, Post, Param, Query, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiParam } from '@nestjs/swagger';
import type { AdvertisementService, AdvertisementView, User } from '@contractor-connect/core';
import { ADVERTISEMENT_SERVICE } from '../core/core.module.js';
import { OptionalUser, Public } from '../auth/index.js';
import { ActiveAdsQueryDto } from './dto/index.js';

@ApiTags('advertisements')
@Public()
@Controller('advertisements')
export class AdvertisementsController {
  constructor(@Inject(ADVERTISEMENT_SERVICE) private readonly ads: AdvertisementService) {}

  @Get()
  @ApiOperation({ summary: 'Ads running now, filtered to the caller\'s audience when signed in' })
  public async listActive(
    @Query() query: ActiveAdsQueryDto,
    @OptionalUser() user: User | undefined
  ): Promise<AdvertisementView[]> {
    return this.ads.listActive({ position: query.position, audience: user?.userType });
  }

  @Post(':id/impression')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Advertisement ID' })
  public async impression(@Param('id') id: string): Promise<{ impressions: number }> {
    return { impressions: await this.ads.recordImpression(id) };
  }

  @Post(':id/click')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Advertisement ID' })
  public async click(@Param('id') id: string): Promise<{ clicks: number }> {
    return { clicks: await this.ads.recordClick(id) };
  }
}
