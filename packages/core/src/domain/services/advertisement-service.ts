/**
 * AdvertisementService - banner and slider placements with impression/click counters
 */

import type { UserType } from '../entities/accounts.js';
import type { UploadInput } from '../entities/common.js';
import type { AdAudience, AdPosition, AdType, Advertisement } from '../entities/advertisements.js';
import { AD_AUDIENCES, AD_POSITIONS, AD_TYPES, clickThroughRate, isCurrentlyActive } from '../entities/advertisements.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { NotFoundError, ValidationError } from '../repositories/errors.js';
import { MAX_IMAGE_BYTES, validateImage, type MediaStorage } from '../../infrastructure/media/media-storage.js';
import { byNewest, roundTo } from '../utils/dates.js';
import { validateEnum, validateRange, validateRequiredString } from './validators.js';

const DEFAULT_BUTTON_TEXT = 'Learn More';
const DEFAULT_BACKGROUND = '#f97316';
const DEFAULT_TEXT_COLOR = '#ffffff';
const COLOR_PATTERN = /^#[0-9a-fA-F]{6}$/;

export interface AdvertisementInput {
  title: string;
  description?: string;
  imageUrl?: string;
  linkUrl?: string;
  buttonText?: string;
  adType?: AdType;
  position: AdPosition;
  targetAudience?: AdAudience;
  backgroundColor?: string;
  textColor?: string;
  startDate: string;
  endDate: string;
  priority?: number;
  isActive?: boolean;
}

export type AdvertisementUpdate = Partial<AdvertisementInput>;

export interface AdvertisementView extends Advertisement {
  clickThroughRate: number;
  isCurrentlyActive: boolean;
}

export interface ActiveAdsQuery {
  position?: AdPosition;
  /** Caller's user type; anonymous callers see every audience */
  audience?: UserType;
}

/**
 * Audiences shown to a user type: `all` plus the type's own
 */
function audiencesFor(userType: UserType): readonly AdAudience[] {
  return userType === 'contractor' ? ['all', 'contractors'] : ['all', 'clients'];
}

function validateColor(value: string | undefined, fieldName: string): void {
  if (value !== undefined && !COLOR_PATTERN.test(value)) {
    throw new ValidationError(`${fieldName} must be a hex color like #ffffff`, [{ field: fieldName, message: 'Invalid color', value }]);
  }
}

export class AdvertisementService {
  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly media: MediaStorage,
    private readonly clock: () => Date = () => new Date()
  ) {}

  public toView(ad: Advertisement): AdvertisementView {
    return {
      ...ad,
      clickThroughRate: roundTo(clickThroughRate(ad), 2),
      isCurrentlyActive: isCurrentlyActive(ad, this.clock()),
    };
  }

  /**
   * Currently active ads, highest priority first
   */
  public async listActive(query: ActiveAdsQuery = {}): Promise<AdvertisementView[]> {
    const now = this.clock();
    const audiences = query.audience !== undefined ? audiencesFor(query.audience) : AD_AUDIENCES;
    const ads = await this.repositories.repository('advertisements').findMany(
      (ad) =>
        isCurrentlyActive(ad, now) &&
        (query.position === undefined || ad.position === query.position) &&
        audiences.includes(ad.targetAudience)
    );
    return ads.sort((a, b) => b.priority - a.priority || byNewest(a, b)).map((ad) => this.toView(ad));
  }

  public async listAll(): Promise<AdvertisementView[]> {
    const ads = await this.repositories.repository('advertisements').findAll();
    return ads.sort(byNewest).map((ad) => this.toView(ad));
  }

  public async get(adId: string): Promise<AdvertisementView> {
    return this.toView(await this.requireAd(adId));
  }

  /**
   * Either `imageUrl` or an uploaded image is required
   */
  public async create(createdById: string, input: AdvertisementInput, image?: UploadInput): Promise<AdvertisementView> {
    validateRequiredString(input.title, 'title');
    this.validate(input);
    const imageUrl = image !== undefined ? await this.storeImage(image) : input.imageUrl;
    if (imageUrl === undefined || imageUrl.trim() === '') {
      throw new ValidationError('An image is required', [{ field: 'image', message: 'Required' }]);
    }
    const ad = await this.repositories.repository('advertisements').create({
      title: input.title.trim(),
      description: input.description ?? '',
      imageUrl,
      linkUrl: input.linkUrl,
      buttonText: input.buttonText ?? DEFAULT_BUTTON_TEXT,
      adType: input.adType ?? 'banner',
      position: input.position,
      targetAudience: input.targetAudience ?? 'all',
      backgroundColor: input.backgroundColor ?? DEFAULT_BACKGROUND,
      textColor: input.textColor ?? DEFAULT_TEXT_COLOR,
      startDate: input.startDate,
      endDate: input.endDate,
      priority: input.priority ?? 1,
      isActive: input.isActive ?? true,
      impressions: 0,
      clicks: 0,
      createdById,
    });
    return this.toView(ad);
  }

  public async update(adId: string, input: AdvertisementUpdate, image?: UploadInput): Promise<AdvertisementView> {
    const current = await this.requireAd(adId);
    this.validate({ ...current, ...input });
    let imageUrl = input.imageUrl;
    if (image !== undefined) {
      imageUrl = await this.storeImage(image);
      await this.media.delete(current.imageUrl);
    }
    const updated = await this.repositories.repository('advertisements').update(adId, { ...input, imageUrl });
    return this.toView(updated);
  }

  public async delete(adId: string): Promise<void> {
    const ad = await this.requireAd(adId);
    await this.repositories.repository('advertisements').delete(adId);
    await this.media.delete(ad.imageUrl);
  }

  public async recordImpression(adId: string): Promise<number> {
    const ad = await this.bump(adId, 'impressions');
    return ad.impressions;
  }

  public async recordClick(adId: string): Promise<number> {
    const ad = await this.bump(adId, 'clicks');
    return ad.clicks;
  }

  private async bump(adId: string, counter: 'impressions' | 'clicks'): Promise<Advertisement> {
    const ads = this.repositories.repository('advertisements');
    await this.requireAd(adId);
    return ads.withLock(`counter-${adId}`, async () => {
      const current = await ads.findById(adId);
      return ads.update(
        adId,
        counter === 'impressions' ? { impressions: current.impressions + 1 } : { clicks: current.clicks + 1 }
      );
    });
  }

  private validate(input: AdvertisementUpdate): void {
    if (input.adType !== undefined) {
      validateEnum(input.adType, 'adType', AD_TYPES);
    }
    if (input.position !== undefined) {
      validateEnum(input.position, 'position', AD_POSITIONS);
    }
    if (input.targetAudience !== undefined) {
      validateEnum(input.targetAudience, 'targetAudience', AD_AUDIENCES);
    }
    validateRange(input.priority, 'priority', 1, 10);
    validateColor(input.backgroundColor, 'backgroundColor');
    validateColor(input.textColor, 'textColor');
    if (input.startDate !== undefined && input.endDate !== undefined) {
      const start = Date.parse(input.startDate);
      const end = Date.parse(input.endDate);
      if (Number.isNaN(start) || Number.isNaN(end)) {
        throw new ValidationError('Invalid date', [{ field: 'startDate', message: 'Invalid date' }]);
      }
      if (end < start) {
        throw new ValidationError('End date must be after start date', [{ field: 'endDate', message: 'Before start date' }]);
      }
    }
  }

  private async storeImage(image: UploadInput): Promise<string> {
    validateImage(image, MAX_IMAGE_BYTES);
    const stored = await this.media.save('advertisements', image);
    return stored.url;
  }

  private async requireAd(adId: string): Promise<Advertisement> {
    const ad = await this.repositories.repository('advertisements').findByIdOrNull(adId);
    if (ad === null) {
      throw new NotFoundError('Advertisement', adId, { message: 'Advertisement not found' });
    }
    return ad;
  }
}
