/**
 * ContractorService - contractor profiles, search, portfolio and certifications
 */

import type { PublicUser, User } from '../entities/accounts.js';
import { fullNameOf, toPublicUser } from '../entities/accounts.js';
import type { PageRequest, UploadInput } from '../entities/common.js';
import type {
  AvailabilityStatus,
  Category,
  Certification,
  ContractorProfile,
  ExperienceLevel,
  PortfolioItem,
  Skill,
} from '../entities/contractors.js';
import { AVAILABILITY_STATUSES, EXPERIENCE_LEVELS, averageHourlyRate, isCertificationExpired } from '../entities/contractors.js';
import type { Review } from '../entities/reviews.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { NotFoundError, PermissionDeniedError, ValidationError } from '../repositories/errors.js';
import { TtlCache } from '../../infrastructure/cache/ttl-cache.js';
import { MAX_IMAGE_BYTES, validateImage, type MediaStorage } from '../../infrastructure/media/media-storage.js';
import { byNewest, roundTo, todayIso, MS_PER_HOUR } from '../utils/dates.js';
import { haversineMiles, parseLocation, type GeoPoint } from '../utils/geo.js';
import { attachImage, type AttachImageOptions } from '../utils/images.js';
import { paginate, type Page } from '../utils/pagination.js';
import {
  validateDateString,
  validateEnum,
  validateMinMax,
  validateNonNegative,
  validateRequiredString,
} from './validators.js';

const STATS_TTL_MS = MS_PER_HOUR;
const RECENT_REVIEWS = 5;
const DEFAULT_RATE_MIN = 50;
const DEFAULT_RATE_MAX = 100;

// ============================================================================
// Types
// ============================================================================

export interface ContractorSearchInput extends PageRequest {
  query?: string;
  categories?: string[];
  skills?: string[];
  minRating?: number;
  minHourlyRate?: number;
  maxHourlyRate?: number;
  availability?: AvailabilityStatus;
  experienceLevel?: ExperienceLevel;
  verified?: boolean;
  latitude?: number;
  longitude?: number;
  /** miles; defaults to each contractor's service radius */
  radius?: number;
}

export interface ContractorView extends ContractorProfile {
  averageHourlyRate: number;
  user: PublicUser;
  distance?: number;
}

export interface CertificationView extends Certification {
  isExpired: boolean;
}

export interface ContractorDetail extends ContractorView {
  categories: Category[];
  skills: Skill[];
  portfolio: PortfolioItem[];
  certifications: CertificationView[];
  recentReviews: Review[];
}

export interface ContractorStats {
  totalContractors: number;
  availableContractors: number;
  verifiedContractors: number;
  averageRating: number;
  topCategories: { id: string; name: string; contractorCount: number }[];
}

export interface UpdateContractorProfileInput {
  businessName?: string;
  licenseNumber?: string;
  experienceLevel?: ExperienceLevel;
  hourlyRateMin?: number;
  hourlyRateMax?: number;
  availabilityStatus?: AvailabilityStatus;
  responseTimeHours?: number;
  serviceRadius?: number;
  categoryIds?: string[];
  skillIds?: string[];
}

export interface PortfolioInput {
  title: string;
  description?: string;
  categoryId?: string;
  projectDate?: string;
  clientName?: string;
  projectValue?: number;
}

export interface CertificationInput {
  name: string;
  issuingOrganization: string;
  issueDate: string;
  expiryDate?: string;
  certificateNumber?: string;
}

/**
 * 3 for rating >= 4.5, 2 for >= 4.0, 1 for >= 3.5, else 0
 */
export function contractorPriorityScore(rating: number): number {
  if (rating >= 4.5) {
    return 3;
  }
  if (rating >= 4.0) {
    return 2;
  }
  if (rating >= 3.5) {
    return 1;
  }
  return 0;
}

function byContractorRank(a: ContractorProfile, b: ContractorProfile): number {
  return (
    contractorPriorityScore(b.ratingAverage) - contractorPriorityScore(a.ratingAverage) ||
    b.ratingAverage - a.ratingAverage ||
    b.completedProjects - a.completedProjects ||
    a.createdAt.localeCompare(b.createdAt)
  );
}

// ============================================================================
// Service
// ============================================================================

export class ContractorService {
  private readonly statsCache = new TtlCache<ContractorStats>({ defaultTtlMs: STATS_TTL_MS });

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly media: MediaStorage
  ) {}

  // ==========================================================================
  // Catalog
  // ==========================================================================

  public async listCategories(): Promise<Category[]> {
    const categories = await this.repositories.repository('categories').findMany((c) => c.isActive);
    return categories.sort((a, b) => a.name.localeCompare(b.name));
  }

  public async listSkills(categoryId?: string): Promise<Skill[]> {
    const skills = await this.repositories
      .repository('skills')
      .findMany((s) => s.isActive && (categoryId === undefined || s.categoryId === categoryId));
    return skills.sort((a, b) => a.name.localeCompare(b.name));
  }

  // ==========================================================================
  // Search
  // ==========================================================================

  public async search(input: ContractorSearchInput = {}): Promise<Page<ContractorView>> {
    const [profiles, users] = await Promise.all([
      this.repositories.repository('contractor-profiles').findAll(),
      this.activeUsersById(),
    ]);
    const origin: GeoPoint | null =
      input.latitude !== undefined && input.longitude !== undefined
        ? { latitude: input.latitude, longitude: input.longitude }
        : null;
    const queryMatcher = input.query !== undefined && input.query.trim() !== '' ? await this.queryMatcher(input.query) : null;

    const results: ContractorView[] = [];
    for (const profile of profiles.sort(byContractorRank)) {
      const user = users.get(profile.userId);
      if (user === undefined || !matchesFilters(profile, user, input)) {
        continue;
      }
      if (queryMatcher !== null && !queryMatcher(profile, user)) {
        continue;
      }
      const view = toContractorView(profile, user);
      if (origin !== null) {
        const location = parseLocation(user.location);
        if (location === null) {
          continue;
        }
        const distance = haversineMiles(origin, location);
        if (distance > (input.radius ?? profile.serviceRadius)) {
          continue;
        }
        view.distance = roundTo(distance, 2);
      }
      results.push(view);
    }
    return paginate(results, input);
  }

  public async recommended(limit = 10): Promise<ContractorView[]> {
    const [profiles, users] = await Promise.all([
      this.repositories
        .repository('contractor-profiles')
        .findMany((p) => p.availabilityStatus === 'available' && p.ratingAverage >= 4.0),
      this.activeUsersById(),
    ]);
    const ranked = profiles.sort(
      (a, b) => b.ratingAverage - a.ratingAverage || b.completedProjects - a.completedProjects || a.createdAt.localeCompare(b.createdAt)
    );
    const views: ContractorView[] = [];
    for (const profile of ranked) {
      const user = users.get(profile.userId);
      if (user !== undefined) {
        views.push(toContractorView(profile, user));
      }
      if (views.length >= limit) {
        break;
      }
    }
    return views;
  }

  public async stats(): Promise<ContractorStats> {
    return this.statsCache.wrap('contractors', async () => {
      const [profiles, users, categories] = await Promise.all([
        this.repositories.repository('contractor-profiles').findAll(),
        this.activeUsersById(),
        this.repositories.repository('categories').findMany((c) => c.isActive),
      ]);
      const active = profiles.filter((p) => users.has(p.userId));
      const rated = active.filter((p) => p.ratingCount > 0);
      const averageRating =
        rated.length === 0 ? 0 : roundTo(rated.reduce((sum, p) => sum + p.ratingAverage, 0) / rated.length, 2);
      const topCategories = categories
        .map((category) => ({
          id: category.id,
          name: category.name,
          contractorCount: active.filter((p) => p.categoryIds.includes(category.id)).length,
        }))
        .sort((a, b) => b.contractorCount - a.contractorCount || a.name.localeCompare(b.name))
        .slice(0, 5);
      return {
        totalContractors: active.length,
        availableContractors: active.filter((p) => p.availabilityStatus === 'available').length,
        verifiedContractors: active.filter((p) => users.get(p.userId)?.isVerified === true).length,
        averageRating,
        topCategories,
      };
    });
  }

  public invalidateStats(): void {
    this.statsCache.clear();
  }

  // ==========================================================================
  // Profiles
  // ==========================================================================

  public async getDetail(profileId: string): Promise<ContractorDetail> {
    const profile = await this.getProfile(profileId);
    const user = await this.repositories.repository('users').findByIdOrNull(profile.userId);
    if (user === null || !user.isActive) {
      throw new NotFoundError('ContractorProfile', profileId, { message: 'Contractor not found' });
    }
    const today = todayIso();
    const [categories, skills, portfolio, certifications, reviews] = await Promise.all([
      this.repositories.repository('categories').findByIds(profile.categoryIds),
      this.repositories.repository('skills').findByIds(profile.skillIds),
      this.repositories.repository('portfolio-items').findMany((item) => item.contractorId === profile.id),
      this.repositories.repository('certifications').findMany((cert) => cert.contractorId === profile.id),
      this.repositories.repository('reviews').findMany((review) => review.contractorId === profile.id && review.isPublic),
    ]);
    return {
      ...toContractorView(profile, user),
      categories,
      skills,
      portfolio: portfolio.sort(byNewest),
      certifications: certifications.map((cert) => ({ ...cert, isExpired: isCertificationExpired(cert, today) })),
      recentReviews: reviews.sort(byNewest).slice(0, RECENT_REVIEWS),
    };
  }

  /**
   * @throws NotFoundError with message 'Contractor not found'
   */
  public async getProfile(profileId: string): Promise<ContractorProfile> {
    const profile = await this.repositories.repository('contractor-profiles').findByIdOrNull(profileId);
    if (profile === null) {
      throw new NotFoundError('ContractorProfile', profileId, { message: 'Contractor not found' });
    }
    return profile;
  }

  public async findProfileByUserId(userId: string): Promise<ContractorProfile | null> {
    return this.repositories.repository('contractor-profiles').findOne((p) => p.userId === userId);
  }

  /**
   * The caller's own profile, created with default rates on first access
   * @throws PermissionDeniedError for non-contractors
   */
  public async getOwnProfile(user: Pick<User, 'id' | 'userType'>): Promise<ContractorProfile> {
    if (user.userType !== 'contractor') {
      throw new PermissionDeniedError('Only contractors have contractor profiles');
    }
    const profiles = this.repositories.repository('contractor-profiles');
    return profiles.withLock(`user-${user.id}`, async () => {
      const existing = await this.findProfileByUserId(user.id);
      if (existing !== null) {
        return existing;
      }
      return profiles.create({
        userId: user.id,
        businessName: '',
        licenseNumber: '',
        insuranceVerified: false,
        experienceLevel: 'beginner',
        hourlyRateMin: DEFAULT_RATE_MIN,
        hourlyRateMax: DEFAULT_RATE_MAX,
        availabilityStatus: 'available',
        responseTimeHours: 24,
        serviceRadius: 25,
        completedProjects: 0,
        ratingAverage: 0,
        ratingCount: 0,
        categoryIds: [],
        skillIds: [],
      });
    });
  }

  public async updateOwnProfile(
    user: Pick<User, 'id' | 'userType'>,
    input: UpdateContractorProfileInput
  ): Promise<ContractorProfile> {
    const profile = await this.getOwnProfile(user);
    if (input.experienceLevel !== undefined) {
      validateEnum(input.experienceLevel, 'experienceLevel', EXPERIENCE_LEVELS);
    }
    if (input.availabilityStatus !== undefined) {
      validateEnum(input.availabilityStatus, 'availabilityStatus', AVAILABILITY_STATUSES);
    }
    validateNonNegative(input.hourlyRateMin, 'hourlyRateMin');
    validateNonNegative(input.hourlyRateMax, 'hourlyRateMax');
    validateNonNegative(input.serviceRadius, 'serviceRadius');
    validateMinMax(
      input.hourlyRateMin ?? profile.hourlyRateMin,
      input.hourlyRateMax ?? profile.hourlyRateMax,
      'Minimum hourly rate cannot be greater than maximum hourly rate',
      'hourlyRateMin'
    );
    if (input.categoryIds !== undefined) {
      await this.assertAllExist('categories', input.categoryIds, 'Category');
    }
    if (input.skillIds !== undefined) {
      await this.assertAllExist('skills', input.skillIds, 'Skill');
    }
    const updated = await this.repositories.repository('contractor-profiles').update(profile.id, input);
    this.invalidateStats();
    return updated;
  }

  /**
   * Fold a new rating into the running average
   */
  public async updateRating(profileId: string, rating: number): Promise<ContractorProfile> {
    const profiles = this.repositories.repository('contractor-profiles');
    return profiles.withLock(`rating-${profileId}`, async () => {
      const profile = await this.getProfile(profileId);
      const count = profile.ratingCount + 1;
      const average = roundTo((profile.ratingAverage * profile.ratingCount + rating) / count, 2);
      const updated = await profiles.update(profileId, { ratingAverage: average, ratingCount: count });
      this.invalidateStats();
      return updated;
    });
  }

  /**
   * Recompute the average from the stored reviews after an edit or removal
   */
  public async recalculateRating(profileId: string): Promise<ContractorProfile> {
    const profiles = this.repositories.repository('contractor-profiles');
    return profiles.withLock(`rating-${profileId}`, async () => {
      const reviews = await this.repositories.repository('reviews').findMany((r) => r.contractorId === profileId);
      const average =
        reviews.length === 0 ? 0 : roundTo(reviews.reduce((sum, r) => sum + r.rating, 0) / reviews.length, 2);
      const updated = await profiles.update(profileId, { ratingAverage: average, ratingCount: reviews.length });
      this.invalidateStats();
      return updated;
    });
  }

  public async recordCompletedProject(contractorUserId: string): Promise<void> {
    const profile = await this.findProfileByUserId(contractorUserId);
    if (profile === null) {
      return;
    }
    const profiles = this.repositories.repository('contractor-profiles');
    await profiles.withLock(`rating-${profile.id}`, async () => {
      const current = await profiles.findById(profile.id);
      await profiles.update(profile.id, { completedProjects: current.completedProjects + 1 });
    });
    this.invalidateStats();
  }

  // ==========================================================================
  // Portfolio
  // ==========================================================================

  public async listPortfolio(user: Pick<User, 'id' | 'userType'>): Promise<PortfolioItem[]> {
    const profile = await this.getOwnProfile(user);
    const items = await this.repositories.repository('portfolio-items').findMany((item) => item.contractorId === profile.id);
    return items.sort(byNewest);
  }

  public async getPortfolioItem(user: Pick<User, 'id' | 'userType'>, itemId: string): Promise<PortfolioItem> {
    const profile = await this.getOwnProfile(user);
    const item = await this.repositories.repository('portfolio-items').findByIdOrNull(itemId);
    if (item === null || item.contractorId !== profile.id) {
      throw new NotFoundError('PortfolioItem', itemId, { message: 'Portfolio item not found' });
    }
    return item;
  }

  public async createPortfolioItem(user: Pick<User, 'id' | 'userType'>, input: PortfolioInput): Promise<PortfolioItem> {
    validateRequiredString(input.title, 'title');
    validateDateString(input.projectDate, 'projectDate');
    validateNonNegative(input.projectValue, 'projectValue');
    const profile = await this.getOwnProfile(user);
    return this.repositories.repository('portfolio-items').create({
      contractorId: profile.id,
      title: input.title.trim(),
      description: input.description ?? '',
      categoryId: input.categoryId,
      projectDate: input.projectDate,
      clientName: input.clientName,
      projectValue: input.projectValue,
      images: [],
    });
  }

  public async updatePortfolioItem(
    user: Pick<User, 'id' | 'userType'>,
    itemId: string,
    input: Partial<PortfolioInput>
  ): Promise<PortfolioItem> {
    await this.getPortfolioItem(user, itemId);
    validateDateString(input.projectDate, 'projectDate');
    validateNonNegative(input.projectValue, 'projectValue');
    return this.repositories.repository('portfolio-items').update(itemId, input);
  }

  public async deletePortfolioItem(user: Pick<User, 'id' | 'userType'>, itemId: string): Promise<void> {
    const item = await this.getPortfolioItem(user, itemId);
    await this.repositories.repository('portfolio-items').delete(itemId);
    for (const image of item.images) {
      await this.media.delete(image.url);
    }
  }

  public async addPortfolioImage(
    user: Pick<User, 'id' | 'userType'>,
    itemId: string,
    upload: UploadInput,
    options: AttachImageOptions = {}
  ): Promise<PortfolioItem> {
    validateImage(upload, MAX_IMAGE_BYTES);
    const item = await this.getPortfolioItem(user, itemId);
    const stored = await this.media.save('portfolio', upload);
    return this.repositories
      .repository('portfolio-items')
      .update(itemId, { images: attachImage(item.images, stored.url, options) });
  }

  // ==========================================================================
  // Certifications
  // ==========================================================================

  public async listCertifications(user: Pick<User, 'id' | 'userType'>): Promise<CertificationView[]> {
    const profile = await this.getOwnProfile(user);
    const today = todayIso();
    const certifications = await this.repositories
      .repository('certifications')
      .findMany((cert) => cert.contractorId === profile.id);
    return certifications
      .sort((a, b) => b.issueDate.localeCompare(a.issueDate))
      .map((cert) => ({ ...cert, isExpired: isCertificationExpired(cert, today) }));
  }

  public async getCertification(user: Pick<User, 'id' | 'userType'>, certificationId: string): Promise<CertificationView> {
    const profile = await this.getOwnProfile(user);
    const cert = await this.repositories.repository('certifications').findByIdOrNull(certificationId);
    if (cert === null || cert.contractorId !== profile.id) {
      throw new NotFoundError('Certification', certificationId, { message: 'Certification not found' });
    }
    return { ...cert, isExpired: isCertificationExpired(cert, todayIso()) };
  }

  public async createCertification(user: Pick<User, 'id' | 'userType'>, input: CertificationInput): Promise<CertificationView> {
    validateRequiredString(input.name, 'name');
    validateRequiredString(input.issuingOrganization, 'issuingOrganization');
    validateRequiredString(input.issueDate, 'issueDate');
    validateDateString(input.issueDate, 'issueDate');
    validateDateString(input.expiryDate, 'expiryDate');
    const profile = await this.getOwnProfile(user);
    const cert = await this.repositories.repository('certifications').create({
      contractorId: profile.id,
      name: input.name.trim(),
      issuingOrganization: input.issuingOrganization.trim(),
      issueDate: input.issueDate,
      expiryDate: input.expiryDate,
      certificateNumber: input.certificateNumber,
    });
    return { ...cert, isExpired: isCertificationExpired(cert, todayIso()) };
  }

  public async updateCertification(
    user: Pick<User, 'id' | 'userType'>,
    certificationId: string,
    input: Partial<CertificationInput>
  ): Promise<CertificationView> {
    await this.getCertification(user, certificationId);
    validateDateString(input.issueDate, 'issueDate');
    validateDateString(input.expiryDate, 'expiryDate');
    const cert = await this.repositories.repository('certifications').update(certificationId, input);
    return { ...cert, isExpired: isCertificationExpired(cert, todayIso()) };
  }

  public async deleteCertification(user: Pick<User, 'id' | 'userType'>, certificationId: string): Promise<void> {
    await this.getCertification(user, certificationId);
    await this.repositories.repository('certifications').delete(certificationId);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async activeUsersById(): Promise<Map<string, User>> {
    const users = await this.repositories.repository('users').findMany((u) => u.isActive && u.userType === 'contractor');
    return new Map(users.map((u) => [u.id, u]));
  }

  /**
   * Matcher over business name, user name, bio and category or skill names
   */
  private async queryMatcher(query: string): Promise<(profile: ContractorProfile, user: User) => boolean> {
    const needle = query.trim().toLowerCase();
    const [categories, skills] = await Promise.all([
      this.repositories.repository('categories').findMany((c) => c.name.toLowerCase().includes(needle)),
      this.repositories.repository('skills').findMany((s) => s.name.toLowerCase().includes(needle)),
    ]);
    const categoryIds = new Set(categories.map((c) => c.id));
    const skillIds = new Set(skills.map((s) => s.id));
    return (profile, user) =>
      [profile.businessName, fullNameOf(user), user.bio].some((value) => value.toLowerCase().includes(needle)) ||
      profile.categoryIds.some((id) => categoryIds.has(id)) ||
      profile.skillIds.some((id) => skillIds.has(id));
  }

  private async assertAllExist(collection: 'categories' | 'skills', ids: string[], label: string): Promise<void> {
    const found = await this.repositories.repository(collection).findByIds(ids);
    if (found.length !== new Set(ids).size) {
      const message = `Unknown ${label.toLowerCase()} in selection`;
      throw new ValidationError(message, [{ field: collection === 'categories' ? 'categoryIds' : 'skillIds', message, value: ids }]);
    }
  }
}

function matchesFilters(profile: ContractorProfile, user: User, input: ContractorSearchInput): boolean {
  if (input.categories !== undefined && input.categories.length > 0 && !profile.categoryIds.some((id) => input.categories?.includes(id))) {
    return false;
  }
  if (input.skills !== undefined && input.skills.length > 0 && !profile.skillIds.some((id) => input.skills?.includes(id))) {
    return false;
  }
  if (input.minRating !== undefined && profile.ratingAverage < input.minRating) {
    return false;
  }
  if (input.minHourlyRate !== undefined && profile.hourlyRateMin < input.minHourlyRate) {
    return false;
  }
  if (input.maxHourlyRate !== undefined && profile.hourlyRateMax > input.maxHourlyRate) {
    return false;
  }
  if (input.availability !== undefined && profile.availabilityStatus !== input.availability) {
    return false;
  }
  if (input.experienceLevel !== undefined && profile.experienceLevel !== input.experienceLevel) {
    return false;
  }
  if (input.verified === true && !user.isVerified) {
    return false;
  }
  return true;
}

function toContractorView(profile: ContractorProfile, user: User): ContractorView {
  return { ...profile, averageHourlyRate: averageHourlyRate(profile), user: toPublicUser(user) };
}
