export * from './search-contractors.dto.js';
export * from './contractor-profile.dto.js';
export * from './portfolio.dto.js';
export * from './certification.dto.js';
