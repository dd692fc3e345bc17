/**
 * Game State Payload Schema Tests
 */

import { validateGsiPayload } from '../../src/schemas/gsi.schema';

describe('validateGsiPayload', () => {
    it('should accept an empty payload', () => {
        const result = validateGsiPayload({});
        expect(result.success).toBe(true);
    });

    it('should keep unknown fields', () => {
        const result = validateGsiPayload({
            map: { game_time: 300, weather: 'rain' },
            draft: {},
        });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.map?.game_time).toBe(300);
            expect(result.data.map).toMatchObject({ weather: 'rain' });
            expect(result.data).toHaveProperty('draft');
        }
    });

    it('should default minimap image and team', () => {
        const result = validateGsiPayload({
            minimap: { o0: { xpos: 10, ypos: -20 } },
        });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.data.minimap?.o0).toMatchObject({ image: '', team: 0, xpos: 10, ypos: -20 });
        }
    });

    it('should reject a mistyped field', () => {
        const result = validateGsiPayload({ map: { game_time: 'late' } });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.errors[0].path).toEqual(['map', 'game_time']);
        }
    });

    it('should reject negative kill counts', () => {
        const result = validateGsiPayload({ player: { kill_list: { victimid_1: -1 } } });
        expect(result.success).toBe(false);
    });

    it('should reject payloads above the size limit', () => {
        const result = validateGsiPayload({ map: { name: 'x'.repeat(200) } }, 100);

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.errors[0].message).toMatch(/^Payload too large: \d+ bytes \(max: 100\)$/);
        }
    });
});
