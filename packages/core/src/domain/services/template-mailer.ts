/**
 * TemplateMailer - renders stored e-mail templates and hands them to EmailService
 */

import type { EmailTemplate, EmailTemplateType } from '../entities/admin.js';
import type { User } from '../entities/accounts.js';
import { fullNameOf } from '../entities/accounts.js';
import type { RepositoryProvider } from '../repositories/collections.js';
import { formatDate, formatTime } from '../utils/dates.js';
import { renderTemplate, type TemplateContext } from '../utils/template.js';
import type { EmailService, SentEmail } from './email-service.js';

export interface SiteInfo {
  siteName: string;
  siteUrl: string;
}

export interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

export interface TemplateSendInput {
  recipientEmail: string;
  context?: Record<string, string>;
  user?: Pick<User, 'email' | 'firstName' | 'lastName'>;
  admin?: Pick<User, 'email' | 'firstName' | 'lastName'>;
}

export class TemplateMailer {
  constructor(
    private readonly repositories: RepositoryProvider,
    private readonly email: EmailService,
    private readonly site: SiteInfo,
    private readonly clock: () => Date = () => new Date()
  ) {}

  public async findActiveTemplate(templateType: EmailTemplateType): Promise<EmailTemplate | null> {
    return this.repositories
      .repository('email-templates')
      .findOne((template) => template.templateType === templateType && template.isActive);
  }

  /**
   * Default context: site info, current date/time, admin and user details.
   * Explicit context entries win over the defaults.
   */
  public buildContext(input: Omit<TemplateSendInput, 'recipientEmail'>): TemplateContext {
    const now = this.clock();
    const context: Record<string, string> = {
      site_name: this.site.siteName,
      site_url: this.site.siteUrl,
      current_date: formatDate(now),
      current_time: formatTime(now),
    };
    if (input.admin !== undefined) {
      context.admin_name = fullNameOf(input.admin) || input.admin.email;
      context.admin_email = input.admin.email;
    }
    if (input.user !== undefined) {
      context.user_name = fullNameOf(input.user) || input.user.email;
      context.user_email = input.user.email;
      context.user_first_name = input.user.firstName;
      context.user_last_name = input.user.lastName;
    }
    return { ...context, ...input.context };
  }

  public render(template: Pick<EmailTemplate, 'subject' | 'textContent' | 'htmlContent'>, context: TemplateContext): RenderedEmail {
    return {
      subject: renderTemplate(template.subject, context),
      text: renderTemplate(template.textContent, context),
      html: renderTemplate(template.htmlContent, context),
    };
  }

  public async sendTemplate(template: EmailTemplate, input: TemplateSendInput): Promise<SentEmail> {
    const rendered = this.render(template, this.buildContext(input));
    return this.email.send({ to: input.recipientEmail, ...rendered });
  }

  /**
   * Send the active template of the given type.
   * @returns null when no active template of that type exists
   */
  public async sendByType(templateType: EmailTemplateType, input: TemplateSendInput): Promise<SentEmail | null> {
    const template = await this.findActiveTemplate(templateType);
    if (template === null) {
      return null;
    }
    return this.sendTemplate(template, input);
  }
}
