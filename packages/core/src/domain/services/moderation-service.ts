/**
 * ModerationService - auto-moderation, report intake, review queue and warnings
 */

import type {
  ContentAnalysis,
  ContentReport,
  ModeratedContentType,
  ModerationAction,
  ModerationQueueItem,
  ModerationRecord,
  ModerationRule,
  ModerationStatus,
  QueuePriority,
  QueueStatus,
  ReportStatus,
  ReportType,
  RuleAction,
  RuleType,
  UserWarning,
  WarningSeverity,
  WarningType,
} from '../entities/moderation.js';
import {
  MODERATED_CONTENT_TYPES,
  QUEUE_PRIORITY_RANK,
  RISK_TO_QUEUE_PRIORITY,
  RULE_ACTION_RESULT,
  RULE_ACTIONS,
  RULE_TYPES,
  WARNING_SEVERITIES,
  WARNING_TYPES,
} from '../entities/moderation.js';
import { isDeletedAccount } from '../entities/accounts.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { ConflictError, NotFoundError } from '../repositories/errors.js';
import type { DomainLogger } from '../../infrastructure/logging/domain-logger.js';
import { errorMessage } from '../../infrastructure/logging/domain-logger.js';
import { addDays, byNewest, daysAgo, nowIso } from '../utils/dates.js';
import { paginate, type Page } from '../utils/pagination.js';
import type { PageRequest } from '../entities/common.js';
import { ContentAnalyzer } from './content-analyzer.js';
import type { NotificationService } from './notification-service.js';
import { validateEnum, validateRange, validateRequiredString } from './validators.js';

const EXCERPT_LENGTH = 200;
const WARNING_WINDOW_DAYS = 30;
const SUSPENSION_DAYS = 7;
const CRITICAL_WARNINGS_TO_SUSPEND = 2;
const HIGH_WARNINGS_TO_SUSPEND = 5;

// ============================================================================
// Types
// ============================================================================

export interface ModerationOutcome {
  record: ModerationRecord;
  actions: ModerationAction[];
  queueItem: ModerationQueueItem | null;
}

export interface CreateRuleInput {
  name: string;
  ruleType: RuleType;
  action: RuleAction;
  threshold?: number;
  keywords?: string[];
  patterns?: string[];
  isActive?: boolean;
  appliesTo?: ModeratedContentType[];
}

export interface CreateReportInput {
  reporterId: string;
  contentType: string;
  objectId: string;
  reportType: ReportType;
  description: string;
}

export interface ListQueueInput extends PageRequest {
  status?: QueueStatus;
  priority?: QueuePriority;
}

export type QueueDecision = 'approved' | 'rejected' | 'needs_review';

export interface IssueWarningResult {
  warning: UserWarning;
  suspended: boolean;
}

export interface ModerationServiceOptions {
  analyzer?: ContentAnalyzer;
  notifications: NotificationService;
  logger?: DomainLogger;
}

// ============================================================================
// Service
// ============================================================================

export class ModerationService {
  public readonly analyzer: ContentAnalyzer;

  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly options: ModerationServiceOptions
  ) {
    this.analyzer = options.analyzer ?? new ContentAnalyzer();
  }

  public analyze(text: string): ContentAnalysis {
    return this.analyzer.analyze(text);
  }

  /**
   * Analyze and persist, apply the matching rules, queue what needs a human
   */
  public async moderateContent(
    contentType: ModeratedContentType,
    objectId: string,
    text: string,
    authorId: string
  ): Promise<ModerationOutcome> {
    const analysis = this.analyzer.analyze(text);
    const rules = await this.repositories
      .repository('moderation-rules')
      .findMany((rule) => rule.isActive && rule.appliesTo.includes(contentType));
    const matched = rules.sort((a, b) => a.createdAt.localeCompare(b.createdAt)).filter((rule) => this.ruleMatches(rule, analysis, text));

    let status: ModerationStatus = analysis.isApproved ? 'approved' : 'pending';
    let flagged = false;
    for (const rule of matched) {
      const result = RULE_ACTION_RESULT[rule.action];
      if (result === 'flagged') {
        flagged = true;
        status = 'pending';
      } else {
        status = result;
      }
    }

    const record = await this.repositories.repository('moderation-records').create({
      contentType,
      objectId,
      authorId,
      contentExcerpt: text.slice(0, EXCERPT_LENGTH),
      analysis,
      status,
      matchedRuleIds: matched.map((rule) => rule.id),
    });

    const actions: ModerationAction[] = [];
    for (const rule of matched) {
      actions.push(
        await this.repositories.repository('moderation-actions').create({
          recordId: record.id,
          actionType: RULE_ACTION_RESULT[rule.action],
          reason: `Matched rule: ${rule.name}`,
          isAutomated: true,
        })
      );
    }

    let queueItem: ModerationQueueItem | null = null;
    if (analysis.requiresReview || flagged || status === 'quarantined') {
      queueItem = await this.repositories.repository('moderation-queue').create({
        recordId: record.id,
        contentType,
        objectId,
        priority: RISK_TO_QUEUE_PRIORITY[analysis.riskLevel],
        status: 'pending',
        notes: '',
      });
    }

    if (analysis.riskLevel !== 'low') {
      this.options.logger?.info?.(`Moderated ${contentType} ${objectId}: ${analysis.riskLevel} risk, ${status}`);
    }
    return { record, actions, queueItem };
  }

  /**
   * Auto-moderation entry point for content hooks. Never throws.
   */
  public async runHook(
    contentType: ModeratedContentType,
    objectId: string,
    text: string,
    authorId: string
  ): Promise<ModerationOutcome | null> {
    if (text.trim() === '') {
      return null;
    }
    try {
      return await this.moderateContent(contentType, objectId, text, authorId);
    } catch (error) {
      this.options.logger?.warn?.(`Auto-moderation of ${contentType} ${objectId} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private ruleMatches(rule: ModerationRule, analysis: ContentAnalysis, text: string): boolean {
    switch (rule.ruleType) {
      case 'profanity':
        return analysis.profanityScore >= rule.threshold;
      case 'spam':
        return analysis.spamScore >= rule.threshold;
      case 'inappropriate':
        return analysis.toxicityScore >= rule.threshold;
      case 'custom':
      case 'personal_info':
      case 'copyright': {
        const lowered = text.toLowerCase();
        if (rule.keywords.some((keyword) => keyword !== '' && lowered.includes(keyword.toLowerCase()))) {
          return true;
        }
        return rule.patterns.some((pattern) => {
          try {
            return new RegExp(pattern, 'i').test(text);
          } catch (error) {
            this.options.logger?.warn?.(`Skipping invalid pattern in rule ${rule.name}: ${errorMessage(error)}`);
            return false;
          }
        });
      }
    }
  }

  // ==========================================================================
  // Rules
  // ==========================================================================

  public async createRule(input: CreateRuleInput): Promise<ModerationRule> {
    validateRequiredString(input.name, 'name');
    validateEnum(input.ruleType, 'ruleType', RULE_TYPES);
    validateEnum(input.action, 'action', RULE_ACTIONS);
    validateRange(input.threshold, 'threshold', 0, 1);
    for (const type of input.appliesTo ?? []) {
      validateEnum(type, 'appliesTo', MODERATED_CONTENT_TYPES);
    }
    return this.repositories.repository('moderation-rules').create({
      name: input.name.trim(),
      ruleType: input.ruleType,
      action: input.action,
      threshold: input.threshold ?? 0.5,
      keywords: input.keywords ?? [],
      patterns: input.patterns ?? [],
      isActive: input.isActive ?? true,
      appliesTo: input.appliesTo ?? [...MODERATED_CONTENT_TYPES],
    });
  }

  public async listRules(): Promise<ModerationRule[]> {
    const rules = await this.repositories.repository('moderation-rules').findAll();
    return rules.sort((a, b) => a.name.localeCompare(b.name));
  }

  public async listRecords(objectId?: string): Promise<ModerationRecord[]> {
    const records = await this.repositories
      .repository('moderation-records')
      .findMany((record) => objectId === undefined || record.objectId === objectId);
    return records.sort(byNewest);
  }

  // ==========================================================================
  // Reports (complaints)
  // ==========================================================================

  public async createReport(input: CreateReportInput): Promise<ContentReport> {
    validateRequiredString(input.contentType, 'contentType');
    validateRequiredString(input.objectId, 'objectId');
    const report = await this.repositories.repository('content-reports').create({
      reporterId: input.reporterId,
      contentType: input.contentType,
      objectId: input.objectId,
      reportType: input.reportType,
      description: input.description,
      status: 'pending',
    });
    await this.repositories.repository('moderation-queue').create({
      reportId: report.id,
      contentType: 'report',
      objectId: input.objectId,
      priority: 'high',
      status: 'pending',
      notes: '',
    });
    return report;
  }

  public async listReports(input: { status?: ReportStatus } & PageRequest = {}): Promise<Page<ContentReport>> {
    const reports = await this.repositories
      .repository('content-reports')
      .findMany((report) => input.status === undefined || report.status === input.status);
    return paginate(reports.sort(byNewest), input);
  }

  public async resolveReport(
    reportId: string,
    moderatorId: string,
    resolution: string,
    status: Extract<ReportStatus, 'resolved' | 'rejected'>
  ): Promise<ContentReport> {
    const reports = this.repositories.repository('content-reports');
    const report = await reports.findByIdOrNull(reportId);
    if (report === null) {
      throw new NotFoundError('ContentReport', reportId, { message: 'Complaint not found' });
    }
    if (report.status === 'resolved' || report.status === 'rejected') {
      throw new ConflictError('This complaint has already been processed', 'state', { reportId });
    }
    const updated = await reports.update(reportId, {
      status,
      resolution,
      resolvedBy: moderatorId,
      resolvedAt: nowIso(),
    });

    const queue = this.repositories.repository('moderation-queue');
    const items = await queue.findMany((item) => item.reportId === reportId && (item.status === 'pending' || item.status === 'in_review'));
    for (const item of items) {
      await queue.update(item.id, {
        status: status === 'resolved' ? 'approved' : 'rejected',
        assignedTo: moderatorId,
        reviewedAt: nowIso(),
        notes: resolution,
      });
    }
    return updated;
  }

  // ==========================================================================
  // Review queue
  // ==========================================================================

  public async listQueue(input: ListQueueInput = {}): Promise<Page<ModerationQueueItem>> {
    const items = await this.repositories
      .repository('moderation-queue')
      .findMany(
        (item) =>
          (input.status === undefined || item.status === input.status) &&
          (input.priority === undefined || item.priority === input.priority)
      );
    return paginate(items.sort(byQueueOrder), input);
  }

  public async getQueueItem(itemId: string): Promise<ModerationQueueItem> {
    return this.repositories.repository('moderation-queue').findById(itemId);
  }

  public async assignQueueItem(itemId: string, moderatorId: string): Promise<ModerationQueueItem> {
    const queue = this.repositories.repository('moderation-queue');
    const item = await queue.findById(itemId);
    if (item.status !== 'pending' && item.status !== 'needs_review' && item.status !== 'in_review') {
      throw new ConflictError('This item has already been reviewed', 'state', { itemId });
    }
    return queue.update(itemId, { status: 'in_review', assignedTo: moderatorId });
  }

  /**
   * Close a queue item. Approve and reject also decide the linked record or report.
   */
  public async completeQueueItem(
    itemId: string,
    moderatorId: string,
    decision: QueueDecision,
    notes?: string
  ): Promise<ModerationQueueItem> {
    const queue = this.repositories.repository('moderation-queue');
    const item = await queue.findById(itemId);
    if (item.status === 'approved' || item.status === 'rejected') {
      throw new ConflictError('This item has already been reviewed', 'state', { itemId });
    }

    const updated = await queue.update(itemId, {
      status: decision,
      assignedTo: moderatorId,
      reviewedAt: nowIso(),
      notes: notes ?? item.notes,
    });
    if (decision === 'needs_review') {
      return updated;
    }

    if (item.recordId !== undefined) {
      await this.repositories.repository('moderation-actions').create({
        recordId: item.recordId,
        actionType: decision,
        moderatorId,
        reason: notes ?? '',
        isAutomated: false,
      });
      await this.repositories.repository('moderation-records').update(item.recordId, { status: decision });
    }
    if (item.reportId !== undefined) {
      const report = await this.repositories.repository('content-reports').findByIdOrNull(item.reportId);
      if (report !== null && report.status !== 'resolved' && report.status !== 'rejected') {
        await this.repositories.repository('content-reports').update(report.id, {
          status: decision === 'approved' ? 'resolved' : 'rejected',
          resolution: notes ?? '',
          resolvedBy: moderatorId,
          resolvedAt: nowIso(),
        });
      }
    }
    return updated;
  }

  /**
   * Highest priority pending item, oldest first. With a moderator id, items
   * assigned to someone else are skipped.
   */
  public async getNextQueueItem(moderatorId?: string): Promise<ModerationQueueItem | null> {
    const pending = await this.repositories
      .repository('moderation-queue')
      .findMany(
        (item) =>
          item.status === 'pending' &&
          (moderatorId === undefined || item.assignedTo === undefined || item.assignedTo === moderatorId)
      );
    return pending.sort(byQueueOrder)[0] ?? null;
  }

  // ==========================================================================
  // Warnings and suspensions
  // ==========================================================================

  /**
   * Record a warning; repeated serious warnings suspend the account for a week
   */
  public async issueWarning(
    userId: string,
    warningType: WarningType,
    severity: WarningSeverity,
    reason: string,
    issuedBy?: string,
    now: Date = new Date()
  ): Promise<IssueWarningResult> {
    validateEnum(warningType, 'warningType', WARNING_TYPES);
    validateEnum(severity, 'severity', WARNING_SEVERITIES);
    validateRequiredString(reason, 'reason');
    const user = await this.repositories.repository('users').findById(userId);
    const warnings = this.repositories.repository('user-warnings');
    const warning = await warnings.create({ userId, issuedBy, warningType, severity, reason });

    const since = daysAgo(WARNING_WINDOW_DAYS, now).getTime();
    const recent = await warnings.findMany(
      (w) => w.userId === userId && w.warningType !== 'suspension' && Date.parse(w.createdAt) >= since
    );
    const critical = recent.filter((w) => w.severity === 'critical').length;
    const high = recent.filter((w) => w.severity === 'high').length;

    if (!user.isActive || (critical < CRITICAL_WARNINGS_TO_SUSPEND && high < HIGH_WARNINGS_TO_SUSPEND)) {
      return { warning, suspended: false };
    }

    const expiresAt = addDays(now, SUSPENSION_DAYS).toISOString();
    await this.repositories.repository('users').update(userId, { isActive: false, isOnline: false });
    await warnings.create({
      userId,
      issuedBy,
      warningType: 'suspension',
      severity: 'critical',
      reason: `Automatic suspension after repeated warnings: ${reason}`,
      expiresAt,
    });
    await this.options.notifications.createNotification({
      userId,
      type: 'system',
      title: 'Account suspended',
      message: `Your account has been suspended for ${String(SUSPENSION_DAYS)} days due to repeated violations.`,
      extraData: { expiresAt },
    });
    this.options.logger?.warn?.(`User ${userId} suspended until ${expiresAt}`);
    return { warning, suspended: true };
  }

  public async listWarnings(userId: string): Promise<UserWarning[]> {
    const warnings = await this.repositories.repository('user-warnings').findMany((w) => w.userId === userId);
    return warnings.sort(byNewest);
  }

  /**
   * Reactivate users whose latest suspension has run out. A ban issued from
   * the admin panel after the suspension keeps the account disabled, and a
   * deleted account is never reactivated.
   * @returns number of users reactivated
   */
  public async liftExpiredSuspensions(now: Date = new Date()): Promise<number> {
    const suspensions = await this.repositories
      .repository('user-warnings')
      .findMany((w) => w.warningType === 'suspension' && w.expiresAt !== undefined);

    const latest = new Map<string, UserWarning>();
    for (const suspension of suspensions.sort(byNewest)) {
      if (!latest.has(suspension.userId)) {
        latest.set(suspension.userId, suspension);
      }
    }

    let lifted = 0;
    for (const [userId, suspension] of latest) {
      if (suspension.expiresAt === undefined || Date.parse(suspension.expiresAt) > now.getTime()) {
        continue;
      }
      const user = await this.repositories.repository('users').findByIdOrNull(userId);
      if (user === null || user.isActive) {
        continue;
      }
      const overriding = await this.repositories
        .repository('admin-action-logs')
        .findOne(
          (log) =>
            log.targetId === userId &&
            (log.action === 'delete' || (log.action === 'ban' && log.createdAt > suspension.createdAt))
        );
      if (overriding !== null || isDeletedAccount(user)) {
        continue;
      }
      await this.repositories.repository('users').update(userId, { isActive: true });
      lifted++;
    }
    if (lifted > 0) {
      this.options.logger?.info?.(`Lifted ${String(lifted)} expired suspensions`);
    }
    return lifted;
  }
}

function byQueueOrder(a: ModerationQueueItem, b: ModerationQueueItem): number {
  const rank = QUEUE_PRIORITY_RANK[b.priority] - QUEUE_PRIORITY_RANK[a.priority];
  return rank !== 0 ? rank : a.createdAt.localeCompare(b.createdAt);
}
