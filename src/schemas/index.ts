/**
 * Schemas module - zod validation for runtime output and config files
 */

export type { ValidationResult, ContainerLine, ConfigFile } from './validators';
export {
  SIZE_PATTERN,
  containerLineSchema,
  validateContainerLine,
  parseContainerLine,
  configFileSchema,
  validateConfigFile,
  parseConfigFile,
} from './validators';
