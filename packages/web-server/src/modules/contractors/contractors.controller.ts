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
  Category,
  CertificationView,
  ContractorDetail,
  ContractorProfile,
  ContractorService,
  ContractorStats,
  ContractorView,
  Page,
  PortfolioItem,
  Skill,
  User,
} from '@contractor-connect/core';
import { CONTRACTOR_SERVICE } from '../core/core.module.js';
import { ImageUploadDto, toUploadInput, type MemoryFile } from '../../common/index.js';
import { CurrentUser, Public } from '../auth/index.js';
import {
  SearchContractorsQueryDto,
  ListSkillsQueryDto,
  RecommendedQueryDto,
  UpdateContractorProfileDto,
  CreatePortfolioItemDto,
  UpdatePortfolioItemDto,
  CreateCertificationDto,
  UpdateCertificationDto,
} from './dto/index.js';

@ApiTags('contractors')
@ApiBearerAuth()
@Controller('contractors')
export class ContractorsController {
  constructor(@Inject(CONTRACTOR_SERVICE) private readonly contractors: ContractorService) {}

  // ==========================================================================
  // Directory (public)
  // ==========================================================================

  @Public()
  @Get()
  @ApiOperation({ summary: 'Search contractors' })
  public async search(@Query() query: SearchContractorsQueryDto): Promise<Page<ContractorView>> {
    return this.contractors.search({ ...query });
  }

  @Public()
  @Get('categories')
  @ApiOperation({ summary: 'Active service categories' })
  public async categories(): Promise<Category[]> {
    return this.contractors.listCategories();
  }

  @Public()
  @Get('skills')
  @ApiOperation({ summary: 'Active skills, optionally by category' })
  public async skills(@Query() query: ListSkillsQueryDto): Promise<Skill[]> {
    return this.contractors.listSkills(query.category);
  }

  @Public()
  @Get('stats')
  @ApiOperation({ summary: 'Contractor counts and top categories' })
  public async stats(): Promise<ContractorStats> {
    return this.contractors.stats();
  }

  @Public()
  @Get('recommended')
  @ApiOperation({ summary: 'Available, highly rated contractors' })
  public async recommended(@Query() query: RecommendedQueryDto): Promise<ContractorView[]> {
    return this.contractors.recommended(query.limit);
  }

  // ==========================================================================
  // Own profile
  // ==========================================================================

  @Get('profile')
  @ApiOperation({ summary: 'Own contractor profile, created on first access' })
  @ApiResponse({ status: 403, description: 'Caller is not a contractor' })
  public async getOwnProfile(@CurrentUser() user: User): Promise<ContractorProfile> {
    return this.contractors.getOwnProfile(user);
  }

  @Patch('profile')
  @ApiOperation({ summary: 'Update own contractor profile' })
  public async updateOwnProfile(
    @CurrentUser() user: User,
    @Body() dto: UpdateContractorProfileDto
  ): Promise<ContractorProfile> {
    return this.contractors.updateOwnProfile(user, { ...dto });
  }

  // ==========================================================================
  // Portfolio
  // ==========================================================================

  @Get('portfolio')
  public async listPortfolio(@CurrentUser() user: User): Promise<PortfolioItem[]> {
    return this.contractors.listPortfolio(user);
  }

  @Post('portfolio')
  @HttpCode(HttpStatus.CREATED)
  public async createPortfolioItem(@CurrentUser() user: User, @Body() dto: CreatePortfolioItemDto): Promise<PortfolioItem> {
    return this.contractors.createPortfolioItem(user, { ...dto });
  }

  @Get('portfolio/:id')
  @ApiParam({ name: 'id', description: 'Portfolio item ID' })
  public async getPortfolioItem(@CurrentUser() user: User, @Param('id') id: string): Promise<PortfolioItem> {
    return this.contractors.getPortfolioItem(user, id);
  }

  @Patch('portfolio/:id')
  @ApiParam({ name: 'id', description: 'Portfolio item ID' })
  public async updatePortfolioItem(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: UpdatePortfolioItemDto
  ): Promise<PortfolioItem> {
    return this.contractors.updatePortfolioItem(user, id, { ...dto });
  }

  @Delete('portfolio/:id')
  @ApiParam({ name: 'id', description: 'Portfolio item ID' })
  public async deletePortfolioItem(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.contractors.deletePortfolioItem(user, id);
  }

  @Post('portfolio/:id/images')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('image'))
  @ApiConsumes('multipart/form-data')
  @ApiParam({ name: 'id', description: 'Portfolio item ID' })
  public async addPortfolioImage(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: ImageUploadDto
  ): Promise<PortfolioItem> {
    return this.contractors.addPortfolioImage(user, id, toUploadInput(file, 'image'), { ...dto });
  }

  // ==========================================================================
  // Certifications
  // ==========================================================================

  @Get('certifications')
  public async listCertifications(@CurrentUser() user: User): Promise<CertificationView[]> {
    return this.contractors.listCertifications(user);
  }

  @Post('certifications')
  @HttpCode(HttpStatus.CREATED)
  public async createCertification(
    @CurrentUser() user: User,
    @Body() dto: CreateCertificationDto
  ): Promise<CertificationView> {
    return this.contractors.createCertification(user, { ...dto });
  }

  @Get('certifications/:id')
  @ApiParam({ name: 'id', description: 'Certification ID' })
  public async getCertification(@CurrentUser() user: User, @Param('id') id: string): Promise<CertificationView> {
    return this.contractors.getCertification(user, id);
  }

  @Patch('certifications/:id')
  @ApiParam({ name: 'id', description: 'Certification ID' })
  public async updateCertification(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: UpdateCertificationDto
  ): Promise<CertificationView> {
    return this.contractors.updateCertification(user, id, { ...dto });
  }

  @Delete('certifications/:id')
  @ApiParam({ name: 'id', description: 'Certification ID' })
  public async deleteCertification(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.contractors.deleteCertification(user, id);
  }

  // ==========================================================================
  // Detail (declared last so it does not shadow the static routes)
  // ==========================================================================

  @Public()
  @Get(':id')
  @ApiOperation({ summary: 'Contractor profile with portfolio, certifications and recent reviews' })
  @ApiParam({ name: 'id', description: 'Contractor profile ID' })
  @ApiResponse({ status: 404, description: 'Contractor not found' })
  public async detail(@Param('id') id: string): Promise<ContractorDetail> {
    return this.contractors.getDetail(id);
  }
}
