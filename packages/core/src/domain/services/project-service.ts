/**
 * ProjectService - project postings, applications, milestones, updates and documents
 */

import type { User, UserSummary } from '../entities/accounts.js';
import { displayNameOf, toUserSummary } from '../entities/accounts.js';
import type { PageRequest, UploadInput } from '../entities/common.js';
import type {
  DocumentType,
  MilestoneStatus,
  Project,
  ProjectApplication,
  ProjectDocument,
  ProjectMilestone,
  ProjectPriority,
  ProjectStatus,
  ProjectUpdate,
} from '../entities/projects.js';
import {
  DOCUMENT_TYPES,
  MILESTONE_STATUSES,
  PROJECT_PRIORITIES,
  PROJECT_PRIORITY_SCORE,
  PROJECT_STATUSES,
  PROJECT_STATUS_TRANSITIONS,
  isMilestoneOverdue,
} from '../entities/projects.js';
import { averageHourlyRate } from '../entities/contractors.js';
import type { NotificationType } from '../entities/notifications.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { ConflictError, NotFoundError, PermissionDeniedError, ValidationError } from '../repositories/errors.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';
import { TtlCache } from '../../infrastructure/cache/ttl-cache.js';
import { MAX_ATTACHMENT_BYTES, MAX_IMAGE_BYTES, validateImage, type MediaStorage } from '../../infrastructure/media/media-storage.js';
import { byNewest, MS_PER_HOUR, roundTo, todayIso } from '../utils/dates.js';
import { attachImage, type AttachImageOptions } from '../utils/images.js';
import { paginate, type Page } from '../utils/pagination.js';
import type { ChatService } from './chat-service.js';
import type { ContractorService } from './contractor-service.js';
import type { ModerationService } from './moderation-service.js';
import type { NotificationService } from './notification-service.js';
import {
  validateDateString,
  validateEnum,
  validateMinMax,
  validateNonNegative,
  validateRange,
  validateRequiredString,
} from './validators.js';

const STATS_TTL_MS = MS_PER_HOUR;
const RECOMMENDED_LIMIT = 10;
const HOURS_PER_DAY = 8;
const MAX_PROJECT_DAYS = 30;
const MIN_PROJECT_DAYS = 5;

// ============================================================================
// Types
// ============================================================================

export type Actor = Pick<User, 'id' | 'userType'>;

export interface ProjectSearchInput extends PageRequest {
  query?: string;
  category?: string;
  /** Defaults to published */
  status?: ProjectStatus;
  priority?: ProjectPriority;
  minBudget?: number;
  maxBudget?: number;
  city?: string;
  state?: string;
  clientId?: string;
  contractorId?: string;
}

export interface ProjectInput {
  title: string;
  description: string;
  categoryId: string;
  budgetMin: number;
  budgetMax: number;
  status?: Extract<ProjectStatus, 'draft' | 'published'>;
  priority?: ProjectPriority;
  address?: string;
  city: string;
  state: string;
  postalCode?: string;
  latitude?: number;
  longitude?: number;
  startDate?: string;
  endDate?: string;
  deadline?: string;
}

export type ProjectUpdateInput = Partial<Omit<ProjectInput, 'status'>> & { isFeatured?: boolean };

export interface ProjectDetail extends Project {
  client: UserSummary | null;
  contractor: UserSummary | null;
  milestones: ProjectMilestone[];
  applicationCount: number;
}

export interface ApplicationInput {
  coverLetter: string;
  proposedBudget: number;
  proposedTimeline: number;
}

export interface MilestoneInput {
  title: string;
  description?: string;
  dueDate: string;
  paymentPercentage?: number;
  order?: number;
}

export interface MilestoneUpdateInput extends Partial<MilestoneInput> {
  status?: MilestoneStatus;
}

export interface ProgressUpdateInput {
  title: string;
  content: string;
  progressPercentage?: number;
}

export interface DocumentInput {
  title?: string;
  documentType?: DocumentType;
  isPrivate?: boolean;
}

export interface ProjectStats {
  totalProjects: number;
  activeProjects: number;
  completedProjects: number;
  averageBudget: number;
  byCategory: { id: string; name: string; count: number }[];
}

export interface ProjectServiceOptions {
  notifications: NotificationService;
  chat: ChatService;
  contractors: ContractorService;
  moderation: ModerationService;
  media: MediaStorage;
  logger?: DomainLogger;
}

function byPriorityThenNewest(a: Project, b: Project): number {
  return PROJECT_PRIORITY_SCORE[b.priority] - PROJECT_PRIORITY_SCORE[a.priority] || byNewest(a, b);
}

function isParticipant(project: Project, userId: string): boolean {
  return project.clientId === userId || project.contractorId === userId;
}

// ============================================================================
// Service
// ============================================================================

export class ProjectService {
  private readonly statsCache = new TtlCache<ProjectStats>({ defaultTtlMs: STATS_TTL_MS });

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: ProjectServiceOptions
  ) {}

  // ==========================================================================
  // Projects
  // ==========================================================================

  public async search(input: ProjectSearchInput = {}): Promise<Page<Project>> {
    const status = input.status ?? 'published';
    const needle = input.query?.trim().toLowerCase() ?? '';
    const matches = await this.repositories.repository('projects').findMany(
      (p) =>
        p.status === status &&
        (needle === '' || p.title.toLowerCase().includes(needle) || p.description.toLowerCase().includes(needle)) &&
        (input.category === undefined || p.categoryId === input.category) &&
        (input.priority === undefined || p.priority === input.priority) &&
        (input.minBudget === undefined || p.budgetMax >= input.minBudget) &&
        (input.maxBudget === undefined || p.budgetMin <= input.maxBudget) &&
        (input.city === undefined || p.city.toLowerCase().includes(input.city.toLowerCase())) &&
        (input.state === undefined || p.state.toLowerCase().includes(input.state.toLowerCase())) &&
        (input.clientId === undefined || p.clientId === input.clientId) &&
        (input.contractorId === undefined || p.contractorId === input.contractorId)
    );
    return paginate(matches.sort(byPriorityThenNewest), input);
  }

  /**
   * @throws PermissionDeniedError unless the actor is a client
   */
  public async create(actor: Actor, input: ProjectInput): Promise<Project> {
    if (actor.userType !== 'client') {
      throw new PermissionDeniedError('Only clients can create projects');
    }
    validateRequiredString(input.title, 'title');
    validateRequiredString(input.description, 'description');
    validateRequiredString(input.city, 'city');
    validateRequiredString(input.state, 'state');
    await this.validateProjectFields(input);
    validateMinMax(input.budgetMin, input.budgetMax, 'Minimum budget cannot be greater than maximum budget', 'budgetMin');

    const project = await this.repositories.repository('projects').create({
      clientId: actor.id,
      title: input.title.trim(),
      description: input.description,
      categoryId: input.categoryId,
      budgetMin: input.budgetMin,
      budgetMax: input.budgetMax,
      status: input.status ?? 'published',
      priority: input.priority ?? 'medium',
      address: input.address ?? '',
      city: input.city,
      state: input.state,
      postalCode: input.postalCode ?? '',
      latitude: input.latitude,
      longitude: input.longitude,
      startDate: input.startDate,
      endDate: input.endDate,
      deadline: input.deadline,
      progressPercentage: 0,
      isFeatured: false,
      viewsCount: 0,
      applicationsCount: 0,
      images: [],
    });
    this.statsCache.clear();
    await this.options.moderation.runHook('project', project.id, `${project.title}\n${project.description}`, actor.id);
    return project;
  }

  /**
   * Project with milestones. Counts a view unless the owner is looking.
   * Drafts are only visible to participants.
   */
  public async getDetail(projectId: string, viewerId?: string): Promise<ProjectDetail> {
    let project = await this.requireProject(projectId);
    if (project.status === 'draft' && (viewerId === undefined || !isParticipant(project, viewerId))) {
      throw new NotFoundError('Project', projectId, { message: 'Project not found' });
    }
    if (viewerId !== project.clientId) {
      project = await this.bumpCounter(projectId, 'viewsCount');
    }
    const userIds = project.contractorId !== undefined ? [project.clientId, project.contractorId] : [project.clientId];
    const [users, milestones, applicationCount] = await Promise.all([
      this.repositories.repository('users').findByIds(userIds),
      this.listMilestones(projectId),
      this.repositories.repository('project-applications').count((a) => a.projectId === projectId),
    ]);
    const client = users.find((u) => u.id === project.clientId);
    const contractor = users.find((u) => u.id === project.contractorId);
    return {
      ...project,
      client: client !== undefined ? toUserSummary(client) : null,
      contractor: contractor !== undefined ? toUserSummary(contractor) : null,
      milestones,
      applicationCount,
    };
  }

  public async update(projectId: string, userId: string, input: ProjectUpdateInput): Promise<Project> {
    const project = await this.requireOwner(projectId, userId, 'Only the project owner can edit this project');
    await this.validateProjectFields(input);
    validateMinMax(
      input.budgetMin ?? project.budgetMin,
      input.budgetMax ?? project.budgetMax,
      'Minimum budget cannot be greater than maximum budget',
      'budgetMin'
    );
    const updated = await this.repositories.repository('projects').update(projectId, input);
    this.statsCache.clear();
    if (input.title !== undefined || input.description !== undefined) {
      await this.options.moderation.runHook('project', updated.id, `${updated.title}\n${updated.description}`, userId);
    }
    return updated;
  }

  public async delete(projectId: string, userId: string): Promise<void> {
    const project = await this.requireOwner(projectId, userId, 'Only the project owner can delete this project');
    await this.repositories.repository('projects').delete(projectId);
    for (const image of project.images) {
      await this.options.media.delete(image.url);
    }
    this.statsCache.clear();
  }

  /**
   * Move along PROJECT_STATUS_TRANSITIONS; owner or assigned contractor only
   */
  public async changeStatus(projectId: string, userId: string, status: ProjectStatus): Promise<Project> {
    validateEnum(status, 'status', PROJECT_STATUSES);
    const project = await this.requireProject(projectId);
    if (!isParticipant(project, userId)) {
      throw new PermissionDeniedError('Only the project owner or assigned contractor can change the status');
    }
    if (!PROJECT_STATUS_TRANSITIONS[project.status].includes(status)) {
      throw new ValidationError(`Cannot change status from ${project.status} to ${status}`, [
        { field: 'status', message: 'Invalid transition', value: status },
      ]);
    }
    if (status === 'completed') {
      return this.complete(project, userId);
    }
    const updated = await this.repositories.repository('projects').update(projectId, { status });
    this.statsCache.clear();
    return updated;
  }

  public async addImage(projectId: string, userId: string, upload: UploadInput, options: AttachImageOptions = {}): Promise<Project> {
    validateImage(upload, MAX_IMAGE_BYTES);
    const project = await this.requireOwner(projectId, userId, 'Only the project owner can add images');
    const stored = await this.options.media.save('projects', upload);
    return this.repositories
      .repository('projects')
      .update(projectId, { images: attachImage(project.images, stored.url, options) });
  }

  // ==========================================================================
  // Applications
  // ==========================================================================

  public async apply(projectId: string, actor: Actor, input: ApplicationInput): Promise<ProjectApplication> {
    if (actor.userType !== 'contractor') {
      throw new PermissionDeniedError('Only contractors can apply to projects');
    }
    validateRequiredString(input.coverLetter, 'coverLetter');
    validateNonNegative(input.proposedBudget, 'proposedBudget');
    validateRange(input.proposedTimeline, 'proposedTimeline', 1, 3650);

    const project = await this.requireProject(projectId);
    if (project.status !== 'published') {
      throw new ValidationError('This project is no longer accepting applications', [
        { field: 'project', message: 'Not accepting applications' },
      ]);
    }
    if (project.clientId === actor.id) {
      throw new PermissionDeniedError('You cannot apply to your own project');
    }

    const applications = this.repositories.repository('project-applications');
    const application = await applications.withLock(`project-${projectId}`, async () => {
      const existing = await applications.findOne((a) => a.projectId === projectId && a.contractorId === actor.id);
      if (existing !== null) {
        throw new ConflictError('You have already applied to this project', 'duplicate', { projectId });
      }
      return applications.create({
        projectId,
        contractorId: actor.id,
        coverLetter: input.coverLetter,
        proposedBudget: input.proposedBudget,
        proposedTimeline: input.proposedTimeline,
        status: 'pending',
      });
    });
    await this.bumpCounter(projectId, 'applicationsCount');

    const contractor = await this.repositories.repository('users').findByIdOrNull(actor.id);
    await this.options.notifications.createNotification({
      userId: project.clientId,
      type: 'project_application',
      title: 'New Project Application',
      message: `${contractor !== null ? displayNameOf(contractor) : 'A contractor'} applied to your project "${project.title}"`,
      relatedObjectType: 'project_application',
      relatedObjectId: application.id,
      extraData: { projectId },
    });
    return application;
  }

  /**
   * Owners see every application; anyone else only their own
   */
  public async listApplications(projectId: string, userId: string): Promise<ProjectApplication[]> {
    const project = await this.requireProject(projectId);
    const applications = await this.repositories
      .repository('project-applications')
      .findMany((a) => a.projectId === projectId && (project.clientId === userId || a.contractorId === userId));
    return applications.sort(byNewest);
  }

  public async listMyApplications(contractorId: string): Promise<ProjectApplication[]> {
    const applications = await this.repositories.repository('project-applications').findMany((a) => a.contractorId === contractorId);
    return applications.sort(byNewest);
  }

  public async acceptApplication(applicationId: string, userId: string): Promise<ProjectApplication> {
    const { projectId } = await this.requireApplication(applicationId);
    const applications = this.repositories.repository('project-applications');

    const { accepted, assigned, rejected } = await applications.withLock(`project-${projectId}`, async () => {
      const { application, project } = await this.requirePendingForOwner(
        applicationId,
        userId,
        'Only the project owner can accept applications'
      );
      if (project.status !== 'published') {
        throw new ValidationError('This project is no longer accepting applications', [
          { field: 'project', message: 'Not accepting applications' },
        ]);
      }
      const acceptedApplication = await applications.update(application.id, { status: 'accepted' });
      const assignedProject = await this.repositories
        .repository('projects')
        .update(project.id, { contractorId: application.contractorId, status: 'in_progress' });

      const others = await applications.findMany((a) => a.projectId === project.id && a.status === 'pending' && a.id !== application.id);
      for (const other of others) {
        await applications.update(other.id, { status: 'rejected' });
      }
      return { accepted: acceptedApplication, assigned: assignedProject, rejected: others };
    });
    this.statsCache.clear();

    for (const other of rejected) {
      await this.notify(other.contractorId, 'application_rejected', 'Application Not Selected', `Another contractor was selected for "${assigned.title}"`, assigned.id);
    }
    await this.notify(
      accepted.contractorId,
      'application_accepted',
      'Application Accepted',
      `Your application for "${assigned.title}" has been accepted!`,
      assigned.id
    );
    await this.options.chat.createProjectRoom(assigned, assigned.clientId);
    return accepted;
  }

  public async rejectApplication(applicationId: string, userId: string): Promise<ProjectApplication> {
    const { projectId } = await this.requireApplication(applicationId);
    const applications = this.repositories.repository('project-applications');

    const { rejected, project } = await applications.withLock(`project-${projectId}`, async () => {
      const pending = await this.requirePendingForOwner(applicationId, userId, 'Only the project owner can reject applications');
      return {
        rejected: await applications.update(pending.application.id, { status: 'rejected' }),
        project: pending.project,
      };
    });
    await this.notify(
      rejected.contractorId,
      'application_rejected',
      'Application Rejected',
      `Your application for "${project.title}" has been rejected`,
      project.id
    );
    return rejected;
  }

  public async withdrawApplication(applicationId: string, userId: string): Promise<ProjectApplication> {
    const { projectId } = await this.requireApplication(applicationId);
    const applications = this.repositories.repository('project-applications');

    return applications.withLock(`project-${projectId}`, async () => {
      const application = await this.requireApplication(applicationId);
      if (application.contractorId !== userId) {
        throw new PermissionDeniedError('Only the applicant can withdraw this application');
      }
      if (application.status !== 'pending') {
        throw new ValidationError('This application has already been processed', [{ field: 'status', message: 'Not pending' }]);
      }
      return applications.update(applicationId, { status: 'withdrawn' });
    });
  }

  // ==========================================================================
  // Milestones
  // ==========================================================================

  public async listMilestones(projectId: string): Promise<ProjectMilestone[]> {
    const milestones = await this.repositories.repository('project-milestones').findMany((m) => m.projectId === projectId);
    return milestones.sort((a, b) => a.order - b.order || a.dueDate.localeCompare(b.dueDate));
  }

  public async createMilestone(projectId: string, userId: string, input: MilestoneInput): Promise<ProjectMilestone> {
    await this.requireOwner(projectId, userId, 'Only the project owner can add milestones');
    validateRequiredString(input.title, 'title');
    validateRequiredString(input.dueDate, 'dueDate');
    validateDateString(input.dueDate, 'dueDate');
    validateRange(input.paymentPercentage, 'paymentPercentage', 0, 100);
    const existing = await this.listMilestones(projectId);
    return this.repositories.repository('project-milestones').create({
      projectId,
      title: input.title.trim(),
      description: input.description ?? '',
      dueDate: input.dueDate,
      status: 'pending',
      paymentPercentage: input.paymentPercentage ?? 0,
      order: input.order ?? existing.length,
    });
  }

  public async updateMilestone(milestoneId: string, userId: string, input: MilestoneUpdateInput): Promise<ProjectMilestone> {
    const milestone = await this.requireMilestone(milestoneId);
    await this.requireOwner(milestone.projectId, userId, 'Only the project owner can edit milestones');
    if (input.status !== undefined) {
      validateEnum(input.status, 'status', MILESTONE_STATUSES);
    }
    validateDateString(input.dueDate, 'dueDate');
    validateRange(input.paymentPercentage, 'paymentPercentage', 0, 100);
    const completionDate =
      input.status === 'completed' && milestone.status !== 'completed' ? todayIso() : undefined;
    return this.repositories.repository('project-milestones').update(milestoneId, { ...input, completionDate });
  }

  public async deleteMilestone(milestoneId: string, userId: string): Promise<void> {
    const milestone = await this.requireMilestone(milestoneId);
    await this.requireOwner(milestone.projectId, userId, 'Only the project owner can delete milestones');
    await this.repositories.repository('project-milestones').delete(milestoneId);
  }

  /**
   * Pending or in-progress milestones past their due date become overdue
   */
  public async markOverdueMilestones(now: Date = new Date()): Promise<number> {
    const today = todayIso(now);
    const milestones = this.repositories.repository('project-milestones');
    const overdue = await milestones.findMany(
      (m) => (m.status === 'pending' || m.status === 'in_progress') && isMilestoneOverdue(m, today)
    );
    for (const milestone of overdue) {
      await milestones.update(milestone.id, { status: 'overdue' });
    }
    if (overdue.length > 0) {
      this.options.logger?.info?.(`Marked ${String(overdue.length)} milestones overdue`);
    }
    return overdue.length;
  }

  // ==========================================================================
  // Progress updates
  // ==========================================================================

  public async listUpdates(projectId: string, userId: string): Promise<ProjectUpdate[]> {
    await this.requireParticipant(projectId, userId);
    const updates = await this.repositories.repository('project-updates').findMany((u) => u.projectId === projectId);
    return updates.sort(byNewest);
  }

  public async postUpdate(projectId: string, userId: string, input: ProgressUpdateInput): Promise<ProjectUpdate> {
    const project = await this.requireParticipant(projectId, userId);
    validateRequiredString(input.title, 'title');
    validateRequiredString(input.content, 'content');
    validateRange(input.progressPercentage, 'progressPercentage', 0, 100);

    const update = await this.repositories.repository('project-updates').create({
      projectId,
      authorId: userId,
      title: input.title.trim(),
      content: input.content,
      progressPercentage: input.progressPercentage,
    });

    if (input.progressPercentage !== undefined) {
      if (input.progressPercentage >= 100 && project.status === 'in_progress') {
        await this.complete(project, userId);
        return update;
      }
      await this.repositories.repository('projects').update(projectId, { progressPercentage: input.progressPercentage });
    }

    const otherParty = project.clientId === userId ? project.contractorId : project.clientId;
    if (otherParty !== undefined) {
      await this.notify(otherParty, 'project_update', `Update on "${project.title}"`, input.title, projectId);
    }
    return update;
  }

  // ==========================================================================
  // Documents
  // ==========================================================================

  /**
   * Private documents are only listed for participants
   */
  public async listDocuments(projectId: string, userId?: string): Promise<ProjectDocument[]> {
    const project = await this.requireProject(projectId);
    const canSeePrivate = userId !== undefined && isParticipant(project, userId);
    const documents = await this.repositories
      .repository('project-documents')
      .findMany((d) => d.projectId === projectId && (!d.isPrivate || canSeePrivate));
    return documents.sort(byNewest);
  }

  public async getDocument(documentId: string, userId?: string): Promise<ProjectDocument> {
    const document = await this.repositories.repository('project-documents').findByIdOrNull(documentId);
    if (document === null) {
      throw new NotFoundError('ProjectDocument', documentId, { message: 'Document not found' });
    }
    if (document.isPrivate) {
      const project = await this.requireProject(document.projectId);
      if (userId === undefined || !isParticipant(project, userId)) {
        throw new NotFoundError('ProjectDocument', documentId, { message: 'Document not found' });
      }
    }
    return document;
  }

  public async uploadDocument(projectId: string, userId: string, upload: UploadInput, input: DocumentInput = {}): Promise<ProjectDocument> {
    await this.requireParticipant(projectId, userId);
    if (upload.size > MAX_ATTACHMENT_BYTES) {
      throw new ValidationError('File too large. Maximum size is 10MB.', [{ field: 'file', message: 'File too large', value: upload.size }]);
    }
    const documentType = input.documentType ?? 'other';
    validateEnum(documentType, 'documentType', DOCUMENT_TYPES);
    const stored = await this.options.media.save('project_documents', upload);
    return this.repositories.repository('project-documents').create({
      projectId,
      uploadedById: userId,
      title: input.title !== undefined && input.title.trim() !== '' ? input.title.trim() : upload.originalName,
      documentType,
      url: stored.url,
      fileName: upload.originalName,
      isPrivate: input.isPrivate ?? false,
    });
  }

  /**
   * Uploader or project owner
   */
  public async deleteDocument(documentId: string, userId: string): Promise<void> {
    const document = await this.getDocument(documentId, userId);
    const project = await this.requireProject(document.projectId);
    if (document.uploadedById !== userId && project.clientId !== userId) {
      throw new PermissionDeniedError('Only the uploader or the project owner can delete this document');
    }
    await this.repositories.repository('project-documents').delete(documentId);
    await this.options.media.delete(document.url);
  }

  // ==========================================================================
  // Stats and recommendations
  // ==========================================================================

  public async stats(): Promise<ProjectStats> {
    return this.statsCache.wrap('projects', async () => {
      const [projects, categories] = await Promise.all([
        this.repositories.repository('projects').findAll(),
        this.repositories.repository('categories').findAll(),
      ]);
      const averageBudget =
        projects.length === 0
          ? 0
          : roundTo(projects.reduce((sum, p) => sum + (p.budgetMin + p.budgetMax) / 2, 0) / projects.length, 2);
      const byCategory = categories
        .map((c) => ({ id: c.id, name: c.name, count: projects.filter((p) => p.categoryId === c.id).length }))
        .filter((entry) => entry.count > 0)
        .sort((a, b) => b.count - a.count || a.name.localeCompare(b.name))
        .slice(0, 5);
      return {
        totalProjects: projects.length,
        activeProjects: projects.filter((p) => p.status === 'published' || p.status === 'in_progress').length,
        completedProjects: projects.filter((p) => p.status === 'completed').length,
        averageBudget,
        byCategory,
      };
    });
  }

  /**
   * Published projects in the contractor's categories whose budget fits
   * 5 to 30 working days at the contractor's average rate
   */
  public async recommended(actor: Actor): Promise<Project[]> {
    if (actor.userType !== 'contractor') {
      throw new PermissionDeniedError('Only contractors receive project recommendations');
    }
    const profile = await this.options.contractors.getOwnProfile(actor);
    const dailyRate = averageHourlyRate(profile) * HOURS_PER_DAY;
    const applied = new Set(
      (await this.repositories.repository('project-applications').findMany((a) => a.contractorId === actor.id)).map((a) => a.projectId)
    );
    const projects = await this.repositories.repository('projects').findMany(
      (p) =>
        p.status === 'published' &&
        profile.categoryIds.includes(p.categoryId) &&
        !applied.has(p.id) &&
        p.budgetMin <= dailyRate * MAX_PROJECT_DAYS &&
        p.budgetMax >= dailyRate * MIN_PROJECT_DAYS
    );
    return projects.sort(byPriorityThenNewest).slice(0, RECOMMENDED_LIMIT);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async complete(project: Project, actorId: string): Promise<Project> {
    const completed = await this.repositories
      .repository('projects')
      .update(project.id, { status: 'completed', progressPercentage: 100, endDate: project.endDate ?? todayIso() });
    this.statsCache.clear();
    if (project.contractorId !== undefined) {
      await this.options.contractors.recordCompletedProject(project.contractorId);
    }
    for (const userId of [project.clientId, project.contractorId]) {
      if (userId !== undefined && userId !== actorId) {
        await this.notify(userId, 'project_completed', 'Project Completed', `The project "${project.title}" has been completed!`, project.id);
      }
    }
    return completed;
  }

  private async notify(userId: string, type: NotificationType, title: string, message: string, projectId: string): Promise<void> {
    await this.options.notifications.createNotification({
      userId,
      type,
      title,
      message,
      relatedObjectType: 'project',
      relatedObjectId: projectId,
    });
  }

  private async bumpCounter(projectId: string, field: 'viewsCount' | 'applicationsCount'): Promise<Project> {
    const projects = this.repositories.repository('projects');
    return projects.withLock(`counter-${projectId}`, async () => {
      const current = await projects.findById(projectId);
      return projects.update(
        projectId,
        field === 'viewsCount'
          ? { viewsCount: current.viewsCount + 1 }
          : { applicationsCount: current.applicationsCount + 1 }
      );
    });
  }

  private async validateProjectFields(input: ProjectUpdateInput): Promise<void> {
    if (input.priority !== undefined) {
      validateEnum(input.priority, 'priority', PROJECT_PRIORITIES);
    }
    validateNonNegative(input.budgetMin, 'budgetMin');
    validateNonNegative(input.budgetMax, 'budgetMax');
    validateDateString(input.startDate, 'startDate');
    validateDateString(input.endDate, 'endDate');
    validateDateString(input.deadline, 'deadline');
    if (input.categoryId !== undefined && !(await this.repositories.repository('categories').exists(input.categoryId))) {
      throw new ValidationError('Unknown category', [{ field: 'categoryId', message: 'Unknown category', value: input.categoryId }]);
    }
  }

  private async requireProject(projectId: string): Promise<Project> {
    const project = await this.repositories.repository('projects').findByIdOrNull(projectId);
    if (project === null) {
      throw new NotFoundError('Project', projectId, { message: 'Project not found' });
    }
    return project;
  }

  private async requireOwner(projectId: string, userId: string, message: string): Promise<Project> {
    const project = await this.requireProject(projectId);
    if (project.clientId !== userId) {
      throw new PermissionDeniedError(message, { projectId });
    }
    return project;
  }

  private async requireParticipant(projectId: string, userId: string): Promise<Project> {
    const project = await this.requireProject(projectId);
    if (!isParticipant(project, userId)) {
      throw new PermissionDeniedError('Only the project owner or assigned contractor can do this', { projectId });
    }
    return project;
  }

  private async requireApplication(applicationId: string): Promise<ProjectApplication> {
    const application = await this.repositories.repository('project-applications').findByIdOrNull(applicationId);
    if (application === null) {
      throw new NotFoundError('ProjectApplication', applicationId, { message: 'Application not found' });
    }
    return application;
  }

  private async requirePendingForOwner(
    applicationId: string,
    userId: string,
    message: string
  ): Promise<{ application: ProjectApplication; project: Project }> {
    const application = await this.requireApplication(applicationId);
    const project = await this.requireProject(application.projectId);
    if (project.clientId !== userId) {
      throw new PermissionDeniedError(message, { applicationId });
    }
    if (application.status !== 'pending') {
      throw new ValidationError('This application has already been processed', [{ field: 'status', message: 'Not pending' }]);
    }
    return { application, project };
  }

  private async requireMilestone(milestoneId: string): Promise<ProjectMilestone> {
    const milestone = await this.repositories.repository('project-milestones').findByIdOrNull(milestoneId);
    if (milestone === null) {
      throw new NotFoundError('ProjectMilestone', milestoneId, { message: 'Milestone not found' });
    }
    return milestone;
  }
}
