/**
 * Logger Tests
 */

import { Logger, createLogger, isLogLevel, parseLogLevel } from '../../src/utils/logger';

describe('parseLogLevel', () => {
    it('should accept known levels case-insensitively', () => {
        expect(parseLogLevel('debug')).toBe('debug');
        expect(parseLogLevel(' WARN ')).toBe('warn');
    });

    it('should fall back for unknown or missing values', () => {
        expect(parseLogLevel(undefined)).toBe('info');
        expect(parseLogLevel('verbose')).toBe('info');
        expect(parseLogLevel('verbose', 'error')).toBe('error');
    });

    it('should narrow strings with isLogLevel', () => {
        expect(isLogLevel('info')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});

describe('Logger', () => {
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.useFakeTimers();
        jest.setSystemTime(new Date('2024-01-15T10:30:00.000Z'));
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('should write JSON lines when pretty output is off', () => {
        const logger = new Logger({ service: 'analyzer', level: 'info', pretty: false });

        logger.info('Snapshot applied', { game_time: 120 });

        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
            game_time: 120,
            timestamp: '2024-01-15T10:30:00.000Z',
            level: 'info',
            service: 'analyzer',
            message: 'Snapshot applied',
        });
    });

    it('should drop entries below the minimum level', () => {
        const logger = new Logger({ service: 'analyzer', level: 'warn', pretty: false });

        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('shown');
        logger.error('shown');

        expect(logSpy).not.toHaveBeenCalled();
        expect(warnSpy).toHaveBeenCalledTimes(1);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(logger.isLevelEnabled('debug')).toBe(false);
        expect(logger.isLevelEnabled('error')).toBe(true);
    });

    it('should not let context override reserved fields', () => {
        const logger = new Logger({ service: 'analyzer', pretty: false });

        logger.info('real message', { message: 'spoofed', level: 'error' });

        const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
        expect(entry.message).toBe('real message');
        expect(entry.level).toBe('info');
    });

    it('should merge child context into every entry', () => {
        const logger = new Logger({ service: 'analyzer', pretty: false });
        const child = logger.child({ component: 'engine' }).child({ match_id: 'm1' });

        child.warn('Stale snapshot', { game_time: 30 });

        const entry = JSON.parse(String(warnSpy.mock.calls[0][0]));
        expect(entry.component).toBe('engine');
        expect(entry.match_id).toBe('m1');
        expect(entry.game_time).toBe(30);
        expect(entry.service).toBe('analyzer');
    });

    it('should render one readable line in pretty mode', () => {
        const logger = new Logger({ service: 'analyzer', pretty: true });

        logger.info('Coach insights', { game_time: 90 });

        const line = String(logSpy.mock.calls[0][0]);
        expect(line).toBe(
            '\x1b[36m[10:30:00.000]\x1b[0m \x1b[36mINFO \x1b[0m [analyzer] Coach insights game_time=90'
        );
    });

    it('should build a logger at the requested level', () => {
        const logger = createLogger('analyzer', 'error');
        expect(logger.isLevelEnabled('warn')).toBe(false);
        expect(logger.isLevelEnabled('error')).toBe(true);
    });
});
