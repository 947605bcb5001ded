import { Controller, Post, Body, HttpCode, HttpStatus, Inject } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiBearerAuth } from '@nestjs/swagger';
import type { ContentAnalysis, ContentReport, ModerationService, User } from '@contractor-connect/core';
import { MODERATION_SERVICE } from '../core/core.module.js';
import { CurrentUser } from '../auth/index.js';
import { AnalyzeTextDto, CreateReportDto } from './dto/index.js';

@ApiTags('moderation')
@ApiBearerAuth()
@Controller('moderation')
export class ModerationController {
  constructor(@Inject(MODERATION_SERVICE) private readonly moderation: ModerationService) {}

  @Post('reports')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Report content for the moderators' })
  public async report(@CurrentUser() user: User, @Body() dto: CreateReportDto): Promise<ContentReport> {
    return this.moderation.createReport({ reporterId: user.id, ...dto });
  }

  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Score text without storing anything' })
  public analyze(@Body() dto: AnalyzeTextDto): ContentAnalysis {
    return this.moderation.analyze(dto.text);
  }
}
