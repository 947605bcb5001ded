import type { Entity, Timestamp } from './common.js';

export type AdType = 'banner' | 'slider' | 'popup' | 'sponsored';
export type AdPosition = 'home_slider' | 'home_banner' | 'search_results' | 'project_details' | 'profile_page';
export type AdAudience = 'all' | 'contractors' | 'clients';

export const AD_TYPES: readonly AdType[] = ['banner', 'slider', 'popup', 'sponsored'];
export const AD_POSITIONS: readonly AdPosition[] = [
  'home_slider',
  'home_banner',
  'search_results',
  'project_details',
  'profile_page',
];
export const AD_AUDIENCES: readonly AdAudience[] = ['all', 'contractors', 'clients'];

export interface Advertisement extends Entity {
  title: string;
  description: string;
  imageUrl: string;
  linkUrl?: string;
  buttonText: string;
  adType: AdType;
  position: AdPosition;
  targetAudience: AdAudience;
  backgroundColor: string;
  textColor: string;
  startDate: Timestamp;
  endDate: Timestamp;
  priority: number;
  isActive: boolean;
  impressions: number;
  clicks: number;
  createdById: string;
}

export function clickThroughRate(ad: Pick<Advertisement, 'impressions' | 'clicks'>): number {
  return ad.impressions === 0 ? 0 : (ad.clicks / ad.impressions) * 100;
}

export function isCurrentlyActive(ad: Pick<Advertisement, 'isActive' | 'startDate' | 'endDate'>, now: Date): boolean {
  const time = now.getTime();
  return ad.isActive && Date.parse(ad.startDate) <= time && time <= Date.parse(ad.endDate);
}
