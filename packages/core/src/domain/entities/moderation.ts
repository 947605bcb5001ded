import type { Entity, Timestamp } from './common.js';

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';
export type ModeratedContentType = 'project' | 'message' | 'review' | 'user_profile';
export type RuleType = 'profanity' | 'spam' | 'inappropriate' | 'copyright' | 'personal_info' | 'custom';
export type RuleAction = 'flag' | 'auto_reject' | 'auto_approve' | 'quarantine';
export type ModerationStatus = 'pending' | 'approved' | 'rejected' | 'quarantined';
export type ModerationActionType = 'flagged' | 'rejected' | 'approved' | 'quarantined' | 'warned';
export type QueuePriority = 'low' | 'normal' | 'high' | 'urgent';
export type QueueStatus = 'pending' | 'in_review' | 'approved' | 'rejected' | 'needs_review';
export type ReportType = 'spam' | 'harassment' | 'inappropriate' | 'copyright' | 'fake_profile' | 'scam' | 'other';
export type ReportStatus = 'pending' | 'in_review' | 'resolved' | 'rejected';
export type WarningSeverity = 'low' | 'medium' | 'high' | 'critical';
export type WarningType = 'content' | 'behavior' | 'spam' | 'harassment' | 'suspension' | 'other';

export const MODERATED_CONTENT_TYPES: readonly ModeratedContentType[] = ['project', 'message', 'review', 'user_profile'];
export const RULE_TYPES: readonly RuleType[] = ['profanity', 'spam', 'inappropriate', 'copyright', 'personal_info', 'custom'];
export const RULE_ACTIONS: readonly RuleAction[] = ['flag', 'auto_reject', 'auto_approve', 'quarantine'];
export const REPORT_TYPES: readonly ReportType[] = ['spam', 'harassment', 'inappropriate', 'copyright', 'fake_profile', 'scam', 'other'];
export const REPORT_STATUSES: readonly ReportStatus[] = ['pending', 'in_review', 'resolved', 'rejected'];
export const QUEUE_PRIORITIES: readonly QueuePriority[] = ['low', 'normal', 'high', 'urgent'];
export const QUEUE_STATUSES: readonly QueueStatus[] = ['pending', 'in_review', 'approved', 'rejected', 'needs_review'];
export const WARNING_SEVERITIES: readonly WarningSeverity[] = ['low', 'medium', 'high', 'critical'];
export const WARNING_TYPES: readonly WarningType[] = ['content', 'behavior', 'spam', 'harassment', 'suspension', 'other'];

export const RISK_TO_QUEUE_PRIORITY: Readonly<Record<RiskLevel, QueuePriority>> = {
  critical: 'urgent',
  high: 'high',
  medium: 'normal',
  low: 'low',
};

export const QUEUE_PRIORITY_RANK: Readonly<Record<QueuePriority, number>> = {
  urgent: 4,
  high: 3,
  normal: 2,
  low: 1,
};

export const RULE_ACTION_RESULT: Readonly<Record<RuleAction, Exclude<ModerationActionType, 'warned'>>> = {
  flag: 'flagged',
  auto_reject: 'rejected',
  auto_approve: 'approved',
  quarantine: 'quarantined',
};

export interface ContentAnalysis {
  profanityScore: number;
  spamScore: number;
  toxicityScore: number;
  sentimentScore: number;
  riskLevel: RiskLevel;
  requiresReview: boolean;
  isApproved: boolean;
  flags: string[];
}

export interface ModerationRule extends Entity {
  name: string;
  ruleType: RuleType;
  action: RuleAction;
  threshold: number;
  keywords: string[];
  patterns: string[];
  isActive: boolean;
  appliesTo: ModeratedContentType[];
}

export interface ModerationRecord extends Entity {
  contentType: ModeratedContentType;
  objectId: string;
  authorId: string;
  contentExcerpt: string;
  analysis: ContentAnalysis;
  status: ModerationStatus;
  matchedRuleIds: string[];
}

export interface ModerationAction extends Entity {
  recordId: string;
  actionType: ModerationActionType;
  moderatorId?: string;
  reason: string;
  isAutomated: boolean;
}

export interface ModerationQueueItem extends Entity {
  recordId?: string;
  reportId?: string;
  contentType: ModeratedContentType | 'report';
  objectId: string;
  priority: QueuePriority;
  status: QueueStatus;
  assignedTo?: string;
  reviewedAt?: Timestamp;
  notes: string;
}

export interface ContentReport extends Entity {
  reporterId: string;
  contentType: string;
  objectId: string;
  reportType: ReportType;
  description: string;
  status: ReportStatus;
  resolvedBy?: string;
  resolution?: string;
  resolvedAt?: Timestamp;
}

export interface UserWarning extends Entity {
  userId: string;
  issuedBy?: string;
  warningType: WarningType;
  severity: WarningSeverity;
  reason: string;
  expiresAt?: Timestamp;
}
