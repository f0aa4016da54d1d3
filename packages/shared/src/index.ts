// Shared package entry point
export const PROJECT_NAME = 'rights-parser';
export const VERSION = '1.0.0';

export type Environment = 'dev' | 'staging' | 'prod';

export interface ProjectInfo {
  name: string;
  version: string;
  environment: Environment;
}

export function getProjectInfo(environment: Environment = 'dev'): ProjectInfo {
  return {
    name: PROJECT_NAME,
    version: VERSION,
    environment
  };
}

export * from './logger';
export * from './config';
