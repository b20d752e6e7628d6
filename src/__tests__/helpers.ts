import { jest } from '@jest/globals';
import Logger from '../interfaces/logger';

export function createMockLogger() {
    return {
        error: jest.fn<Logger['error']>(),
        warn: jest.fn<Logger['warn']>(),
        info: jest.fn<Logger['info']>(),
        debug: jest.fn<Logger['debug']>(),
    };
}
