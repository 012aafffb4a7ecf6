import type { Config } from 'jest';

const config: Config = {
  preset: 'ts-jest',
  testEnvironment: '<rootDir>/jest.environment.js',
  testMatch: ['**/tests/**/*.test.ts', '**/tests/**/*.spec.ts'],
  clearMocks: true,
  modulePaths: ['<rootDir>/src'],
};

export default config;
