import type { AttachedImage, Entity } from './common.js';

export type ProjectStatus = 'draft' | 'published' | 'in_progress' | 'completed' | 'cancelled';
export type ProjectPriority = 'low' | 'medium' | 'high' | 'urgent';
export type ApplicationStatus = 'pending' | 'accepted' | 'rejected' | 'withdrawn';
export type MilestoneStatus = 'pending' | 'in_progress' | 'completed' | 'overdue';
export type DocumentType = 'contract' | 'blueprint' | 'permit' | 'invoice' | 'receipt' | 'other';

export const PROJECT_STATUSES: readonly ProjectStatus[] = ['draft', 'published', 'in_progress', 'completed', 'cancelled'];
export const PROJECT_PRIORITIES: readonly ProjectPriority[] = ['low', 'medium', 'high', 'urgent'];
export const MILESTONE_STATUSES: readonly MilestoneStatus[] = ['pending', 'in_progress', 'completed', 'overdue'];
export const DOCUMENT_TYPES: readonly DocumentType[] = ['contract', 'blueprint', 'permit', 'invoice', 'receipt', 'other'];

/**
 * Status changes allowed through the status endpoint
 */
export const PROJECT_STATUS_TRANSITIONS: Readonly<Record<ProjectStatus, readonly ProjectStatus[]>> = {
  draft: ['published', 'cancelled'],
  published: ['draft', 'in_progress', 'cancelled'],
  in_progress: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

export const PROJECT_PRIORITY_SCORE: Readonly<Record<ProjectPriority, number>> = {
  urgent: 4,
  high: 3,
  medium: 2,
  low: 1,
};

export interface Project extends Entity {
  clientId: string;
  contractorId?: string;
  title: string;
  description: string;
  categoryId: string;
  budgetMin: number;
  budgetMax: number;
  status: ProjectStatus;
  priority: ProjectPriority;
  address: string;
  city: string;
  state: string;
  postalCode: string;
  latitude?: number;
  longitude?: number;
  startDate?: string;
  endDate?: string;
  deadline?: string;
  progressPercentage: number;
  isFeatured: boolean;
  viewsCount: number;
  applicationsCount: number;
  images: AttachedImage[];
}

export interface ProjectApplication extends Entity {
  projectId: string;
  /** Applicant user id (a contractor) */
  contractorId: string;
  coverLetter: string;
  proposedBudget: number;
  proposedTimeline: number;
  status: ApplicationStatus;
}

export interface ProjectMilestone extends Entity {
  projectId: string;
  title: string;
  description: string;
  dueDate: string;
  completionDate?: string;
  status: MilestoneStatus;
  paymentPercentage: number;
  order: number;
}

export interface ProjectUpdate extends Entity {
  projectId: string;
  authorId: string;
  title: string;
  content: string;
  progressPercentage?: number;
}

export interface ProjectDocument extends Entity {
  projectId: string;
  uploadedById: string;
  title: string;
  documentType: DocumentType;
  url: string;
  fileName: string;
  isPrivate: boolean;
}

export function isMilestoneOverdue(milestone: Pick<ProjectMilestone, 'dueDate' | 'status'>, today: string): boolean {
  return milestone.status !== 'completed' && milestone.dueDate.slice(0, 10) < today;
}
