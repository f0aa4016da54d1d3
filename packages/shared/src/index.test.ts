import { describe, it, expect } from 'vitest';
import { getProjectInfo, PROJECT_NAME, VERSION, type Environment } from './index';

describe('Shared Package', () => {
  describe('Constants', () => {
    it('should export correct project name', () => {
      expect(PROJECT_NAME).toBe('rights-parser');
    });

    it('should export correct version', () => {
      expect(VERSION).toBe('1.0.0');
    });
  });

  describe('getProjectInfo', () => {
    it('should return project info with default environment', () => {
      expect(getProjectInfo()).toEqual({
        name: 'rights-parser',
        version: '1.0.0',
        environment: 'dev'
      });
    });

    it('should handle all valid environments', () => {
      const environments: Environment[] = ['dev', 'staging', 'prod'];

      environments.forEach(env => {
        const result = getProjectInfo(env);
        expect(result.environment).toBe(env);
        expect(result.name).toBe(PROJECT_NAME);
        expect(result.version).toBe(VERSION);
      });
    });
  });
});
