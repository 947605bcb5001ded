/**
 * ReviewService - client reviews of contractors, responses and helpful votes
 */

import type { UserSummary } from '../entities/accounts.js';
import { toUserSummary } from '../entities/accounts.js';
import type { PageRequest, UploadInput } from '../entities/common.js';
import type { RatingDistribution, Review, ReviewHelpful } from '../entities/reviews.js';
import { averageCategoryRating } from '../entities/reviews.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { ConflictError, NotFoundError, PermissionDeniedError } from '../repositories/errors.js';
import { MAX_IMAGE_BYTES, validateImage, type MediaStorage } from '../../infrastructure/media/media-storage.js';
import { byNewest, nowIso, roundTo } from '../utils/dates.js';
import { attachImage, type AttachImageOptions } from '../utils/images.js';
import { mapPage, paginate, type Page } from '../utils/pagination.js';
import type { ContractorService } from './contractor-service.js';
import type { ModerationService } from './moderation-service.js';
import type { NotificationService } from './notification-service.js';
import type { Actor } from './project-service.js';
import { validateRange, validateRequiredString, validateTextLength } from './validators.js';

// ============================================================================
// Types
// ============================================================================

export interface ReviewFilter extends PageRequest {
  contractor?: string;
  rating?: number;
  verified?: boolean;
}

export interface CategoryRatings {
  qualityRating?: number;
  communicationRating?: number;
  timelinessRating?: number;
  professionalismRating?: number;
}

export interface CreateReviewInput extends CategoryRatings {
  contractorId: string;
  projectId?: string;
  rating: number;
  title: string;
  comment: string;
}

export interface UpdateReviewInput extends CategoryRatings {
  rating?: number;
  title?: string;
  comment?: string;
  isPublic?: boolean;
}

export interface HelpfulCounts {
  helpfulCount: number;
  notHelpfulCount: number;
}

export interface ReviewView extends Review, HelpfulCounts {
  client: UserSummary | null;
  averageCategoryRating: number | null;
  userHelpfulVote: boolean | null;
}

export interface ReviewStats {
  totalReviews: number;
  verifiedReviews: number;
  averageRating: number;
  ratingDistribution: RatingDistribution;
}

export interface ContractorReviewStats extends ReviewStats {
  categoryAverages: {
    quality: number;
    communication: number;
    timeliness: number;
    professionalism: number;
  };
}

export interface ReviewServiceOptions {
  contractors: ContractorService;
  notifications: NotificationService;
  moderation: ModerationService;
  media: MediaStorage;
}

function meanOf(values: (number | undefined)[]): number {
  const present = values.filter((value): value is number => value !== undefined);
  return present.length === 0 ? 0 : roundTo(present.reduce((sum, value) => sum + value, 0) / present.length, 2);
}

function statsOf(reviews: Review[]): ReviewStats {
  const ratingDistribution: RatingDistribution = { '1': 0, '2': 0, '3': 0, '4': 0, '5': 0 };
  for (const review of reviews) {
    const key = String(Math.round(review.rating));
    if (key === '1' || key === '2' || key === '3' || key === '4' || key === '5') {
      ratingDistribution[key] += 1;
    }
  }
  return {
    totalReviews: reviews.length,
    verifiedReviews: reviews.filter((r) => r.isVerified).length,
    averageRating: meanOf(reviews.map((r) => r.rating)),
    ratingDistribution,
  };
}

function validateRatings(input: CategoryRatings & { rating?: number }): void {
  validateRange(input.rating, 'rating', 1, 5);
  validateRange(input.qualityRating, 'qualityRating', 1, 5);
  validateRange(input.communicationRating, 'communicationRating', 1, 5);
  validateRange(input.timelinessRating, 'timelinessRating', 1, 5);
  validateRange(input.professionalismRating, 'professionalismRating', 1, 5);
}

// ============================================================================
// Service
// ============================================================================

export class ReviewService {
  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: ReviewServiceOptions
  ) {}

  public async list(filter: ReviewFilter = {}, viewerId?: string): Promise<Page<ReviewView>> {
    const reviews = await this.repositories.repository('reviews').findMany(
      (r) =>
        r.isPublic &&
        (filter.contractor === undefined || r.contractorId === filter.contractor) &&
        (filter.rating === undefined || r.rating === filter.rating) &&
        (filter.verified === undefined || r.isVerified === filter.verified)
    );
    const page = paginate(reviews.sort(byNewest), filter);
    const views = await this.toViews(page.items, viewerId);
    return mapPage(page, (review) => views.get(review.id) ?? this.bareView(review));
  }

  /**
   * @throws NotFoundError when the profile does not exist
   */
  public async listForContractor(profileId: string, filter: PageRequest = {}, viewerId?: string): Promise<Page<ReviewView>> {
    await this.options.contractors.getProfile(profileId);
    return this.list({ ...filter, contractor: profileId }, viewerId);
  }

  public async create(actor: Actor, input: CreateReviewInput): Promise<Review> {
    if (actor.userType !== 'client') {
      throw new PermissionDeniedError('Only clients can write reviews');
    }
    validateRatings(input);
    validateRequiredString(input.title, 'title');
    validateTextLength(input.title, 'title', 200);
    validateRequiredString(input.comment, 'comment');

    const profile = await this.options.contractors.getProfile(input.contractorId);
    let isVerified = false;
    if (input.projectId !== undefined) {
      const project = await this.repositories.repository('projects').findByIdOrNull(input.projectId);
      if (project === null) {
        throw new NotFoundError('Project', input.projectId, { message: 'Project not found' });
      }
      if (project.clientId !== actor.id) {
        throw new PermissionDeniedError('You can only review contractors for your own projects');
      }
      isVerified = project.status === 'completed';
    }

    const reviews = this.repositories.repository('reviews');
    const review = await reviews.withLock(`contractor-${profile.id}`, async () => {
      const duplicate = await reviews.findOne(
        (r) => r.clientId === actor.id && r.contractorId === profile.id && r.projectId === input.projectId
      );
      if (duplicate !== null) {
        throw new ConflictError('You have already reviewed this contractor for this project', 'duplicate', {
          reviewId: duplicate.id,
        });
      }
      return reviews.create({
        clientId: actor.id,
        contractorId: profile.id,
        projectId: input.projectId,
        rating: input.rating,
        qualityRating: input.qualityRating,
        communicationRating: input.communicationRating,
        timelinessRating: input.timelinessRating,
        professionalismRating: input.professionalismRating,
        title: input.title.trim(),
        comment: input.comment,
        isVerified,
        isFeatured: false,
        isPublic: true,
        images: [],
      });
    });

    await this.options.contractors.updateRating(profile.id, review.rating);
    await this.options.notifications.createNotification({
      userId: profile.userId,
      type: 'review_received',
      title: 'New Review Received',
      message: `You received a ${String(review.rating)}-star review: "${review.title}"`,
      relatedObjectType: 'review',
      relatedObjectId: review.id,
    });
    await this.options.moderation.runHook('review', review.id, review.comment, actor.id);
    return review;
  }

  /**
   * Public reviews, or the caller's own
   */
  public async get(reviewId: string, viewerId?: string): Promise<ReviewView> {
    const review = await this.requireReview(reviewId);
    if (!review.isPublic && review.clientId !== viewerId) {
      throw new NotFoundError('Review', reviewId, { message: 'Review not found' });
    }
    const views = await this.toViews([review], viewerId);
    return views.get(review.id) ?? this.bareView(review);
  }

  public async update(reviewId: string, userId: string, input: UpdateReviewInput): Promise<Review> {
    const review = await this.requireAuthor(reviewId, userId, 'You can only update your own reviews');
    validateRatings(input);
    validateTextLength(input.title, 'title', 200);
    const updated = await this.repositories.repository('reviews').update(reviewId, input);
    if (input.rating !== undefined && input.rating !== review.rating) {
      await this.options.contractors.recalculateRating(review.contractorId);
    }
    if (input.comment !== undefined) {
      await this.options.moderation.runHook('review', updated.id, updated.comment, userId);
    }
    return updated;
  }

  public async delete(reviewId: string, userId: string): Promise<void> {
    const review = await this.requireAuthor(reviewId, userId, 'You can only delete your own reviews');
    const helpful = this.repositories.repository('review-helpful');
    const votes = await helpful.findMany((v) => v.reviewId === reviewId);
    await helpful.deleteMany(votes.map((v) => v.id));
    await this.repositories.repository('reviews').delete(reviewId);
    for (const image of review.images) {
      await this.options.media.delete(image.url);
    }
    await this.options.contractors.recalculateRating(review.contractorId);
  }

  // ==========================================================================
  // Responses, votes and images
  // ==========================================================================

  public async respond(reviewId: string, userId: string, content: string): Promise<Review> {
    validateRequiredString(content, 'content');
    const review = await this.requireReview(reviewId);
    const profile = await this.options.contractors.getProfile(review.contractorId);
    if (profile.userId !== userId) {
      throw new PermissionDeniedError('Only the contractor can respond to their review');
    }
    const reviews = this.repositories.repository('reviews');
    return reviews.withLock(`response-${reviewId}`, async () => {
      const current = await reviews.findById(reviewId);
      if (current.response !== undefined) {
        throw new ConflictError('Response already exists', 'duplicate', { reviewId });
      }
      return reviews.update(reviewId, { response: { contractorUserId: userId, content, createdAt: nowIso() } });
    });
  }

  /**
   * Voting again replaces the earlier vote
   */
  public async voteHelpful(reviewId: string, userId: string, isHelpful: boolean): Promise<HelpfulCounts> {
    await this.requireReview(reviewId);
    const helpful = this.repositories.repository('review-helpful');
    await helpful.withLock(`vote-${reviewId}-${userId}`, async () => {
      const existing = await helpful.findOne((v) => v.reviewId === reviewId && v.userId === userId);
      if (existing === null) {
        await helpful.create({ reviewId, userId, isHelpful });
      } else if (existing.isHelpful !== isHelpful) {
        await helpful.update(existing.id, { isHelpful });
      }
    });
    return this.countVotes(await helpful.findMany((v) => v.reviewId === reviewId));
  }

  public async addImage(reviewId: string, userId: string, upload: UploadInput, options: AttachImageOptions = {}): Promise<Review> {
    validateImage(upload, MAX_IMAGE_BYTES);
    const review = await this.requireAuthor(reviewId, userId, 'You can only add images to your own reviews');
    const stored = await this.options.media.save('review_images', upload);
    return this.repositories
      .repository('reviews')
      .update(reviewId, { images: attachImage(review.images, stored.url, options) });
  }

  // ==========================================================================
  // Stats
  // ==========================================================================

  public async stats(): Promise<ReviewStats> {
    return statsOf(await this.repositories.repository('reviews').findMany((r) => r.isPublic));
  }

  public async contractorStats(profileId: string): Promise<ContractorReviewStats> {
    await this.options.contractors.getProfile(profileId);
    const reviews = await this.repositories
      .repository('reviews')
      .findMany((r) => r.isPublic && r.contractorId === profileId);
    return {
      ...statsOf(reviews),
      categoryAverages: {
        quality: meanOf(reviews.map((r) => r.qualityRating)),
        communication: meanOf(reviews.map((r) => r.communicationRating)),
        timeliness: meanOf(reviews.map((r) => r.timelinessRating)),
        professionalism: meanOf(reviews.map((r) => r.professionalismRating)),
      },
    };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private countVotes(votes: ReviewHelpful[]): HelpfulCounts {
    const helpfulCount = votes.filter((v) => v.isHelpful).length;
    return { helpfulCount, notHelpfulCount: votes.length - helpfulCount };
  }

  private async toViews(reviews: Review[], viewerId?: string): Promise<Map<string, ReviewView>> {
    const ids = new Set(reviews.map((r) => r.id));
    const [votes, clients] = await Promise.all([
      this.repositories.repository('review-helpful').findMany((v) => ids.has(v.reviewId)),
      this.repositories.repository('users').findByIds([...new Set(reviews.map((r) => r.clientId))]),
    ]);
    const views = new Map<string, ReviewView>();
    for (const review of reviews) {
      const reviewVotes = votes.filter((v) => v.reviewId === review.id);
      const own = viewerId !== undefined ? reviewVotes.find((v) => v.userId === viewerId) : undefined;
      const client = clients.find((u) => u.id === review.clientId);
      views.set(review.id, {
        ...review,
        ...this.countVotes(reviewVotes),
        client: client !== undefined ? toUserSummary(client) : null,
        averageCategoryRating: averageCategoryRating(review),
        userHelpfulVote: own !== undefined ? own.isHelpful : null,
      });
    }
    return views;
  }

  private bareView(review: Review): ReviewView {
    return {
      ...review,
      helpfulCount: 0,
      notHelpfulCount: 0,
      client: null,
      averageCategoryRating: averageCategoryRating(review),
      userHelpfulVote: null,
    };
  }

  private async requireReview(reviewId: string): Promise<Review> {
    const review = await this.repositories.repository('reviews').findByIdOrNull(reviewId);
    if (review === null) {
      throw new NotFoundError('Review', reviewId, { message: 'Review not found' });
    }
    return review;
  }

  private async requireAuthor(reviewId: string, userId: string, message: string): Promise<Review> {
    const review = await this.requireReview(reviewId);
    if (review.clientId !== userId) {
      throw new PermissionDeniedError(message, { reviewId });
    }
    return review;
  }
}
