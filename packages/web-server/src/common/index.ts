// Filters
export { GlobalExceptionFilter, type ErrorResponse } from './filters/global-exception.filter.js';

// Interceptors
export { TransformInterceptor, type SuccessResponse } from './interceptors/transform.interceptor.js';
export { LoggingInterceptor } from './interceptors/logging.interceptor.js';

// Pipes
export { createValidationPipe, formatValidationErrors } from './pipes/validation.pipe.js';

// Logging and uploads
export { createNestDomainLogger } from './logging/nest-domain-logger.js';
export { toUploadInput, toOptionalUploadInput, type MemoryFile } from './uploads/upload-input.js';

// DTO helpers
export { ToBoolean, ToStringArray } from './dto/query-transforms.js';
export { PaginationQueryDto } from './dto/pagination-query.dto.js';
export { ImageUploadDto } from './dto/image-upload.dto.js';
