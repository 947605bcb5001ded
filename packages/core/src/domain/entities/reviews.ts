import type { AttachedImage, Entity, Timestamp } from './common.js';

export interface ReviewResponse {
  contractorUserId: string;
  content: string;
  createdAt: Timestamp;
}

export interface Review extends Entity {
  clientId: string;
  /** Contractor profile id */
  contractorId: string;
  projectId?: string;
  rating: number;
  qualityRating?: number;
  communicationRating?: number;
  timelinessRating?: number;
  professionalismRating?: number;
  title: string;
  comment: string;
  isVerified: boolean;
  isFeatured: boolean;
  isPublic: boolean;
  images: AttachedImage[];
  response?: ReviewResponse;
}

export interface ReviewHelpful extends Entity {
  reviewId: string;
  userId: string;
  isHelpful: boolean;
}

export type RatingDistribution = Record<'1' | '2' | '3' | '4' | '5', number>;

const CATEGORY_RATING_FIELDS = [
  'qualityRating',
  'communicationRating',
  'timelinessRating',
  'professionalismRating',
] as const;

/**
 * Mean of the category ratings present on the review, or null when none are
 */
export function averageCategoryRating(review: Pick<Review, (typeof CATEGORY_RATING_FIELDS)[number]>): number | null {
  const ratings = CATEGORY_RATING_FIELDS.map((field) => review[field]).filter(
    (value): value is number => value !== undefined
  );
  if (ratings.length === 0) {
    return null;
  }
  return ratings.reduce((sum, value) => sum + value, 0) / ratings.length;
}
