/**
 * ReviewService tests
 *
 * Covers:
 * - review creation with verification and duplicate checks
 * - contractor rating upkeep on create, edit and delete
 * - responses, helpful votes and images
 * - review statistics
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  ConflictError,
  PermissionDeniedError,
  ValidationError,
  type ContractorProfile,
  type CreateReviewInput,
  type PublicUser,
} from '@contractor-connect/core';
import {
  cleanupTestContext,
  createCategory,
  createTestContext,
  pngUpload,
  registerUser,
  type TestContext,
} from '../helpers/test-utils.js';

describe('ReviewService', () => {
  let ctx: TestContext;
  let client: PublicUser;
  let other: PublicUser;
  let contractor: PublicUser;
  let profile: ContractorProfile;

  const reviewInput = (overrides: Partial<CreateReviewInput> = {}): CreateReviewInput => ({
    contractorId: profile.id,
    rating: 5,
    title: 'Great work',
    comment: 'Fixed the sink quickly and cleaned up after',
    ...overrides,
  });

  beforeEach(async () => {
    ctx = await createTestContext('review-service');
    client = await registerUser(ctx, 'alice');
    other = await registerUser(ctx, 'olga');
    contractor = await registerUser(ctx, 'bob', 'contractor');
    profile = await ctx.services.contractors.getOwnProfile(contractor);
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  // ============================================================================
  // Create
  // ============================================================================

  describe('create', () => {
    it('should store the review, update the rating and notify the contractor', async () => {
      const review = await ctx.services.reviews.create(client, reviewInput({ title: ' Great work ' }));

      expect(review).toMatchObject({ rating: 5, title: 'Great work', isVerified: false, isPublic: true });
      const updated = await ctx.services.contractors.getProfile(profile.id);
      expect([updated.ratingAverage, updated.ratingCount]).toEqual([5, 1]);
      const [notification] = (await ctx.services.notifications.list(contractor.id)).items;
      expect(notification?.message).toBe('You received a 5-star review: "Great work"');
    });

    it('should only accept reviews from clients', async () => {
      await expect(ctx.services.reviews.create(contractor, reviewInput())).rejects.toThrow('Only clients can write reviews');
    });

    it('should reject ratings outside 1 to 5', async () => {
      await expect(ctx.services.reviews.create(client, reviewInput({ rating: 6 }))).rejects.toThrow(ValidationError);
      await expect(ctx.services.reviews.create(client, reviewInput({ qualityRating: 0 }))).rejects.toThrow(ValidationError);
    });

    it('should allow one review per contractor and project', async () => {
      await ctx.services.reviews.create(client, reviewInput());

      await expect(ctx.services.reviews.create(client, reviewInput())).rejects.toThrow(ConflictError);
      await expect(ctx.services.reviews.create(client, reviewInput())).rejects.toThrow(
        'You have already reviewed this contractor for this project'
      );
    });

    it('should verify reviews of completed projects owned by the reviewer', async () => {
      const category = await createCategory(ctx);
      const project = await ctx.services.projects.create(client, {
        title: 'Fix sink',
        description: 'Kitchen sink',
        categoryId: category.id,
        budgetMin: 100,
        budgetMax: 200,
        city: 'Springfield',
        state: 'IL',
      });
      await ctx.services.repositories.repository('projects').update(project.id, { status: 'completed' });

      await expect(ctx.services.reviews.create(other, reviewInput({ projectId: project.id }))).rejects.toThrow(
        'You can only review contractors for your own projects'
      );
      const review = await ctx.services.reviews.create(client, reviewInput({ projectId: project.id }));
      const second = await ctx.services.reviews.create(client, reviewInput({ rating: 3 }));

      expect(review.isVerified).toBe(true);
      expect(second.isVerified).toBe(false);
    });
  });

  // ============================================================================
  // Update and delete
  // ============================================================================

  describe('update and delete', () => {
    it('should recalculate the rating when the score changes', async () => {
      const first = await ctx.services.reviews.create(client, reviewInput({ rating: 5 }));
      await ctx.services.reviews.create(other, reviewInput({ rating: 4 }));

      await ctx.services.reviews.update(first.id, client.id, { rating: 2 });
      expect((await ctx.services.contractors.getProfile(profile.id)).ratingAverage).toBe(3);

      await ctx.services.reviews.delete(first.id, client.id);
      const updated = await ctx.services.contractors.getProfile(profile.id);
      expect([updated.ratingAverage, updated.ratingCount]).toEqual([4, 1]);
    });

    it("should refuse changes to someone else's review", async () => {
      const review = await ctx.services.reviews.create(client, reviewInput());

      await expect(ctx.services.reviews.update(review.id, other.id, { title: 'Mine now' })).rejects.toThrow(
        'You can only update your own reviews'
      );
      await expect(ctx.services.reviews.delete(review.id, other.id)).rejects.toThrow(PermissionDeniedError);
    });

    it('should hide private reviews from everyone but the author', async () => {
      const review = await ctx.services.reviews.create(client, reviewInput());
      await ctx.services.reviews.update(review.id, client.id, { isPublic: false });

      await expect(ctx.services.reviews.get(review.id, other.id)).rejects.toThrow('Review not found');
      expect((await ctx.services.reviews.get(review.id, client.id)).id).toBe(review.id);
      expect((await ctx.services.reviews.list()).total).toBe(0);
    });
  });

  // ============================================================================
  // Responses, votes and images
  // ============================================================================

  describe('respond', () => {
    it('should accept a single response from the reviewed contractor', async () => {
      const review = await ctx.services.reviews.create(client, reviewInput());

      await expect(ctx.services.reviews.respond(review.id, client.id, 'Thanks')).rejects.toThrow(
        'Only the contractor can respond to their review'
      );
      const responded = await ctx.services.reviews.respond(review.id, contractor.id, 'Thank you!');
      await expect(ctx.services.reviews.respond(review.id, contractor.id, 'Again')).rejects.toThrow('Response already exists');

      expect(responded.response?.content).toBe('Thank you!');
      expect(responded.response?.contractorUserId).toBe(contractor.id);
    });
  });

  describe('voteHelpful', () => {
    it('should replace an earlier vote by the same user', async () => {
      const review = await ctx.services.reviews.create(client, reviewInput());

      await ctx.services.reviews.voteHelpful(review.id, other.id, true);
      await ctx.services.reviews.voteHelpful(review.id, contractor.id, true);
      const counts = await ctx.services.reviews.voteHelpful(review.id, other.id, false);

      expect(counts).toEqual({ helpfulCount: 1, notHelpfulCount: 1 });
      const view = await ctx.services.reviews.get(review.id, other.id);
      expect(view.userHelpfulVote).toBe(false);
      expect(view.client?.id).toBe(client.id);
    });
  });

  describe('addImage', () => {
    it('should attach images to your own review', async () => {
      const review = await ctx.services.reviews.create(client, reviewInput());

      const updated = await ctx.services.reviews.addImage(review.id, client.id, pngUpload('after.png'), { caption: 'After' });

      expect(updated.images).toHaveLength(1);
      expect(updated.images[0]?.isPrimary).toBe(true);
      expect(updated.images[0]?.url).toMatch(/^\/media\/review_images\/.+\.png$/);
      await expect(ctx.services.reviews.addImage(review.id, other.id, pngUpload())).rejects.toThrow(
        'You can only add images to your own reviews'
      );
    });
  });

  // ============================================================================
  // Stats
  // ============================================================================

  describe('stats', () => {
    it("should summarize a contractor's public reviews", async () => {
      await ctx.services.reviews.create(client, reviewInput({ rating: 5, qualityRating: 5, communicationRating: 4 }));
      await ctx.services.reviews.create(other, reviewInput({ rating: 4, qualityRating: 4 }));

      const stats = await ctx.services.reviews.contractorStats(profile.id);

      expect(stats).toEqual({
        totalReviews: 2,
        verifiedReviews: 0,
        averageRating: 4.5,
        ratingDistribution: { '1': 0, '2': 0, '3': 0, '4': 1, '5': 1 },
        categoryAverages: { quality: 4.5, communication: 4, timeliness: 0, professionalism: 0 },
      });
    });

    it("should list a contractor's reviews with the average category rating", async () => {
      await ctx.services.reviews.create(client, reviewInput({ qualityRating: 5, timelinessRating: 4 }));

      const page = await ctx.services.reviews.listForContractor(profile.id);

      expect(page.items.map((r) => r.averageCategoryRating)).toEqual([4.5]);
      await expect(ctx.services.reviews.listForContractor('missing')).rejects.toThrow('Contractor not found');
    });
  });
});
