export { AppConfigModule } from './config.module.js';
export { configuration, configValidationSchema, readAppConfig, type AppConfig } from './configuration.js';
