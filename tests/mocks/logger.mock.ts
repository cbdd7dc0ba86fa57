// tests/mocks/logger.mock.ts
import { mock, MockProxy } from 'jest-mock-extended';
import { ILogger } from '../../src/application/interfaces/ILogger';

export const createMockLogger = (): MockProxy<ILogger> => mock<ILogger>();

export const mockLogger: MockProxy<ILogger> = createMockLogger();
