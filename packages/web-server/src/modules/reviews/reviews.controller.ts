import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  Inject,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth, ApiConsumes } from '@nestjs/swagger';
import type {
  ContractorReviewStats,
  HelpfulCounts,
  Page,
  Review,
  ReviewService,
  ReviewStats,
  ReviewView,
  User,
} from '@contractor-connect/core';
import { REVIEW_SERVICE } from '../core/core.module.js';
import { ImageUploadDto, PaginationQueryDto, toUploadInput, type MemoryFile } from '../../common/index.js';
import { CurrentUser, OptionalUser, Public } from '../auth/index.js';
import {
  ListReviewsQueryDto,
  CreateReviewDto,
  UpdateReviewDto,
  ReviewResponseDto,
  HelpfulVoteDto,
} from './dto/index.js';

@ApiTags('reviews')
@ApiBearerAuth()
@Controller('reviews')
export class ReviewsController {
  constructor(@Inject(REVIEW_SERVICE) private readonly reviews: ReviewService) {}

  @Public()
  @Get()
  @ApiOperation({ summary: 'Public reviews, newest first' })
  public async list(
    @Query() query: ListReviewsQueryDto,
    @OptionalUser() user: User | undefined
  ): Promise<Page<ReviewView>> {
    return this.reviews.list({ ...query }, user?.id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Review a contractor (clients only)' })
  @ApiResponse({ status: 403, description: 'Not a client, or not the project owner' })
  @ApiResponse({ status: 409, description: 'Already reviewed for this project' })
  public async create(@CurrentUser() user: User, @Body() dto: CreateReviewDto): Promise<Review> {
    return this.reviews.create(user, { ...dto });
  }

  @Public()
  @Get('stats')
  public async stats(): Promise<ReviewStats> {
    return this.reviews.stats();
  }

  @Public()
  @Get('contractor/:contractorId')
  @ApiParam({ name: 'contractorId', description: 'Contractor profile ID' })
  public async forContractor(
    @Param('contractorId') contractorId: string,
    @Query() query: PaginationQueryDto,
    @OptionalUser() user: User | undefined
  ): Promise<Page<ReviewView>> {
    return this.reviews.listForContractor(contractorId, { ...query }, user?.id);
  }

  @Public()
  @Get('contractor/:contractorId/stats')
  @ApiParam({ name: 'contractorId', description: 'Contractor profile ID' })
  public async contractorStats(@Param('contractorId') contractorId: string): Promise<ContractorReviewStats> {
    return this.reviews.contractorStats(contractorId);
  }

  @Public()
  @Get(':id')
  @ApiParam({ name: 'id', description: 'Review ID' })
  @ApiResponse({ status: 404, description: 'Review not found' })
  public async get(@Param('id') id: string, @OptionalUser() user: User | undefined): Promise<ReviewView> {
    return this.reviews.get(id, user?.id);
  }

  @Patch(':id')
  @ApiParam({ name: 'id', description: 'Review ID' })
  public async update(@CurrentUser() user: User, @Param('id') id: string, @Body() dto: UpdateReviewDto): Promise<Review> {
    return this.reviews.update(id, user.id, { ...dto });
  }

  @Delete(':id')
  @ApiParam({ name: 'id', description: 'Review ID' })
  public async delete(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.reviews.delete(id, user.id);
  }

  @Post(':id/response')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Reply as the reviewed contractor' })
  @ApiParam({ name: 'id', description: 'Review ID' })
  @ApiResponse({ status: 409, description: 'Response already exists' })
  public async respond(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: ReviewResponseDto
  ): Promise<Review> {
    return this.reviews.respond(id, user.id, dto.content);
  }

  @Post(':id/helpful')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Review ID' })
  public async helpful(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: HelpfulVoteDto
  ): Promise<HelpfulCounts> {
    return this.reviews.voteHelpful(id, user.id, dto.isHelpful);
  }

  @Post(':id/images')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('image'))
  @ApiConsumes('multipart/form-data')
  @ApiParam({ name: 'id', description: 'Review ID' })
  public async addImage(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: ImageUploadDto
  ): Promise<Review> {
    return this.reviews.addImage(id, user.id, toUploadInput(file, 'image'), { ...dto });
  }
}
