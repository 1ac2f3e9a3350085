export * from './schema';
export * from './core/errors';
export {
    applyDefaults,
    isCompleteConfig,
    resolveName,
    validateConfig,
    validateProjectName,
    validateRuntimeVersion,
    type ResolvedName,
} from './core/resolve-config';
export {
    FILE_GROUPS,
    expandOutputPath,
    selectFileGroups,
    type FileGroup,
    type FileSpec,
} from './core/file-groups';
export {
    buildTemplateContext,
    escapeTomlString,
    type TemplateContext,
} from './core/template-context';
export {
    createTemplateEnvironment,
    getTemplateEnvironment,
    type TemplateEnvironment,
} from './core/template-env';
export {
    generateProject,
    planProject,
    resolveDestination,
    writePlannedFiles,
    type GenerateOptions,
    type PlannedFile,
} from './core/generate-project';
export { Logger, defaultLogger, type LogLevel, type LoggerOptions } from './util/logger';
