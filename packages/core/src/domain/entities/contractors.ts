import type { AttachedImage, Entity } from './common.js';

export type ExperienceLevel = 'beginner' | 'intermediate' | 'experienced' | 'expert';
export type AvailabilityStatus = 'available' | 'busy' | 'unavailable';

export const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = ['beginner', 'intermediate', 'experienced', 'expert'];
export const AVAILABILITY_STATUSES: readonly AvailabilityStatus[] = ['available', 'busy', 'unavailable'];

export interface Category extends Entity {
  name: string;
  slug: string;
  icon: string;
  description: string;
  isActive: boolean;
}

export interface Skill extends Entity {
  name: string;
  categoryId: string;
  isActive: boolean;
}

export interface ContractorProfile extends Entity {
  userId: string;
  businessName: string;
  licenseNumber: string;
  insuranceVerified: boolean;
  experienceLevel: ExperienceLevel;
  hourlyRateMin: number;
  hourlyRateMax: number;
  availabilityStatus: AvailabilityStatus;
  responseTimeHours: number;
  serviceRadius: number;
  completedProjects: number;
  ratingAverage: number;
  ratingCount: number;
  categoryIds: string[];
  skillIds: string[];
}

export interface PortfolioItem extends Entity {
  contractorId: string;
  title: string;
  description: string;
  categoryId?: string;
  projectDate?: string;
  clientName?: string;
  projectValue?: number;
  images: AttachedImage[];
}

export interface Certification extends Entity {
  contractorId: string;
  name: string;
  issuingOrganization: string;
  issueDate: string;
  expiryDate?: string;
  certificateNumber?: string;
}

export function averageHourlyRate(profile: Pick<ContractorProfile, 'hourlyRateMin' | 'hourlyRateMax'>): number {
  return (profile.hourlyRateMin + profile.hourlyRateMax) / 2;
}

/**
 * Expired when the expiry date lies strictly before `today` (YYYY-MM-DD)
 */
export function isCertificationExpired(certification: Pick<Certification, 'expiryDate'>, today: string): boolean {
  return certification.expiryDate !== undefined && certification.expiryDate.slice(0, 10) < today;
}
