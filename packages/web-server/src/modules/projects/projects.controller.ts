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
  Page,
  Project,
  ProjectApplication,
  ProjectDetail,
  ProjectDocument,
  ProjectMilestone,
  ProjectService,
  ProjectStats,
  ProjectUpdate,
  User,
} from '@contractor-connect/core';
import { PROJECT_SERVICE } from '../core/core.module.js';
import { ImageUploadDto, toUploadInput, type MemoryFile } from '../../common/index.js';
import { CurrentUser, OptionalUser, Public } from '../auth/index.js';
import {
  SearchProjectsQueryDto,
  CreateProjectDto,
  UpdateProjectDto,
  ChangeStatusDto,
  ApplyToProjectDto,
  CreateMilestoneDto,
  UpdateMilestoneDto,
  CreateProgressUpdateDto,
  UploadDocumentDto,
} from './dto/index.js';

@ApiTags('projects')
@ApiBearerAuth()
@Controller('projects')
export class ProjectsController {
  constructor(@Inject(PROJECT_SERVICE) private readonly projects: ProjectService) {}

  // ==========================================================================
  // Listing and creation
  // ==========================================================================

  @Public()
  @Get()
  @ApiOperation({ summary: 'Search projects (published by default)' })
  public async search(@Query() query: SearchProjectsQueryDto): Promise<Page<Project>> {
    return this.projects.search({ ...query });
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Post a project' })
  @ApiResponse({ status: 403, description: 'Only clients can create projects' })
  public async create(@CurrentUser() user: User, @Body() dto: CreateProjectDto): Promise<Project> {
    return this.projects.create(user, { ...dto });
  }

  @Public()
  @Get('stats')
  @ApiOperation({ summary: 'Project counts, average budget and top categories' })
  public async stats(): Promise<ProjectStats> {
    return this.projects.stats();
  }

  @Get('recommended')
  @ApiOperation({ summary: 'Published projects matching the contractor\'s categories and rate' })
  public async recommended(@CurrentUser() user: User): Promise<Project[]> {
    return this.projects.recommended(user);
  }

  @Get('my-applications')
  @ApiOperation({ summary: 'Applications sent by the caller' })
  public async myApplications(@CurrentUser() user: User): Promise<ProjectApplication[]> {
    return this.projects.listMyApplications(user.id);
  }

  // ==========================================================================
  // Applications
  // ==========================================================================

  @Post('applications/:id/accept')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Application ID' })
  @ApiResponse({ status: 403, description: 'Only the project owner can accept applications' })
  public async accept(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectApplication> {
    return this.projects.acceptApplication(id, user.id);
  }

  @Post('applications/:id/reject')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Application ID' })
  public async reject(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectApplication> {
    return this.projects.rejectApplication(id, user.id);
  }

  @Post('applications/:id/withdraw')
  @HttpCode(HttpStatus.OK)
  @ApiParam({ name: 'id', description: 'Application ID' })
  public async withdraw(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectApplication> {
    return this.projects.withdrawApplication(id, user.id);
  }

  // ==========================================================================
  // Milestones and documents by their own ID
  // ==========================================================================

  @Patch('milestones/:id')
  @ApiParam({ name: 'id', description: 'Milestone ID' })
  public async updateMilestone(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: UpdateMilestoneDto
  ): Promise<ProjectMilestone> {
    return this.projects.updateMilestone(id, user.id, { ...dto });
  }

  @Delete('milestones/:id')
  @ApiParam({ name: 'id', description: 'Milestone ID' })
  public async deleteMilestone(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.projects.deleteMilestone(id, user.id);
  }

  @Get('documents/:id')
  @ApiParam({ name: 'id', description: 'Document ID' })
  public async getDocument(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectDocument> {
    return this.projects.getDocument(id, user.id);
  }

  @Delete('documents/:id')
  @ApiParam({ name: 'id', description: 'Document ID' })
  public async deleteDocument(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.projects.deleteDocument(id, user.id);
  }

  // ==========================================================================
  // Single project
  // ==========================================================================

  @Public()
  @Get(':id')
  @ApiOperation({ summary: 'Project detail; counts a view unless the owner is looking' })
  @ApiParam({ name: 'id', description: 'Project ID' })
  @ApiResponse({ status: 404, description: 'Project not found' })
  public async detail(@Param('id') id: string, @OptionalUser() user: User | undefined): Promise<ProjectDetail> {
    return this.projects.getDetail(id, user?.id);
  }

  @Patch(':id')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async update(@CurrentUser() user: User, @Param('id') id: string, @Body() dto: UpdateProjectDto): Promise<Project> {
    return this.projects.update(id, user.id, { ...dto });
  }

  @Delete(':id')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async delete(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.projects.delete(id, user.id);
  }

  @Patch(':id/status')
  @ApiParam({ name: 'id', description: 'Project ID' })
  @ApiResponse({ status: 400, description: 'Transition not allowed' })
  public async changeStatus(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: ChangeStatusDto
  ): Promise<Project> {
    return this.projects.changeStatus(id, user.id, dto.status);
  }

  @Post(':id/images')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('image'))
  @ApiConsumes('multipart/form-data')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async addImage(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: ImageUploadDto
  ): Promise<Project> {
    return this.projects.addImage(id, user.id, toUploadInput(file, 'image'), { ...dto });
  }

  @Post(':id/apply')
  @HttpCode(HttpStatus.CREATED)
  @ApiParam({ name: 'id', description: 'Project ID' })
  @ApiResponse({ status: 409, description: 'Already applied' })
  public async apply(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: ApplyToProjectDto
  ): Promise<ProjectApplication> {
    return this.projects.apply(id, user, { ...dto });
  }

  @Get(':id/applications')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async applications(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectApplication[]> {
    return this.projects.listApplications(id, user.id);
  }

  @Public()
  @Get(':id/milestones')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async milestones(@Param('id') id: string): Promise<ProjectMilestone[]> {
    return this.projects.listMilestones(id);
  }

  @Post(':id/milestones')
  @HttpCode(HttpStatus.CREATED)
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async createMilestone(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: CreateMilestoneDto
  ): Promise<ProjectMilestone> {
    return this.projects.createMilestone(id, user.id, { ...dto });
  }

  @Get(':id/updates')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async updates(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectUpdate[]> {
    return this.projects.listUpdates(id, user.id);
  }

  @Post(':id/updates')
  @HttpCode(HttpStatus.CREATED)
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async postUpdate(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: CreateProgressUpdateDto
  ): Promise<ProjectUpdate> {
    return this.projects.postUpdate(id, user.id, { ...dto });
  }

  @Get(':id/documents')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async documents(@CurrentUser() user: User, @Param('id') id: string): Promise<ProjectDocument[]> {
    return this.projects.listDocuments(id, user.id);
  }

  @Post(':id/documents')
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor('file'))
  @ApiConsumes('multipart/form-data')
  @ApiParam({ name: 'id', description: 'Project ID' })
  public async uploadDocument(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @UploadedFile() file: MemoryFile | undefined,
    @Body() dto: UploadDocumentDto
  ): Promise<ProjectDocument> {
    return this.projects.uploadDocument(id, user.id, toUploadInput(file, 'file'), { ...dto });
  }
}
