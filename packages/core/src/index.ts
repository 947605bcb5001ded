/**
 * @contractor-connect/core
 *
 * Domain model, services and file-based storage of the contractor
 * marketplace. Hosts (web server, CLI) build everything through
 * createCoreServices().
 */

// ============================================================================
// Entities
// ============================================================================
export * from './domain/entities/index.js';

// ============================================================================
// Repository - Interfaces and errors
// ============================================================================
export * from './domain/repositories/errors.js';
export * from './domain/repositories/interfaces.js';
export * from './domain/repositories/collections.js';

// ============================================================================
// Services
// ============================================================================
export * from './domain/services/account-service.js';
export * from './domain/services/admin-service.js';
export * from './domain/services/advertisement-service.js';
export * from './domain/services/chat-service.js';
export * from './domain/services/content-analyzer.js';
export * from './domain/services/contractor-service.js';
export * from './domain/services/email-service.js';
export * from './domain/services/initial-data-service.js';
export * from './domain/services/moderation-service.js';
export * from './domain/services/notification-service.js';
export * from './domain/services/password-hasher.js';
export * from './domain/services/project-service.js';
export * from './domain/services/review-service.js';
export * from './domain/services/template-mailer.js';
export * from './domain/services/token-service.js';

// Validators
export * from './domain/services/validators.js';

// ============================================================================
// Utils and seed data
// ============================================================================
export * from './domain/utils/dates.js';
export * from './domain/utils/geo.js';
export * from './domain/utils/images.js';
export * from './domain/utils/pagination.js';
export * from './domain/utils/template.js';
export * from './domain/fixtures.js';

// ============================================================================
// Request context
// ============================================================================
export * from './context/request-context.js';

// ============================================================================
// Infrastructure
// ============================================================================
export * from './infrastructure/index.js';

// ============================================================================
// Composition
// ============================================================================
export * from './container.js';
export * from './default-tasks.js';
