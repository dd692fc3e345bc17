/**
 * Game State Integration Payload Schema
 *
 * Zod schemas for the raw JSON the game client posts:
 * - Every section and field optional (the feed omits what it does not know)
 * - Unknown fields ignored (passthrough) so feed additions never reject a payload
 * - Payload size limit
 */

import { z } from 'zod';

// ============================================
// Payload Size Limits
// ============================================

export const GSI_LIMITS = {
    /** Maximum raw payload size in bytes */
    MAX_PAYLOAD_BYTES: 1024 * 1024, // 1MB
} as const;

// ============================================
// Sections
// ============================================

export const GsiProviderSchema = z.object({
    name: z.string().optional(),
    appid: z.number().int().optional(),
    version: z.number().int().optional(),
    timestamp: z.number().int().optional(),
}).passthrough();

export const GsiMapSchema = z.object({
    name: z.string().optional(),
    matchid: z.string().optional(),
    game_time: z.number().int().optional(),
    clock_time: z.number().int().optional(),
    daytime: z.boolean().optional(),
    game_state: z.string().optional(),
    paused: z.boolean().optional(),
    win_team: z.string().optional(),
    radiant_score: z.number().int().optional(),
    dire_score: z.number().int().optional(),
}).passthrough();

export const GsiPlayerSchema = z.object({
    steamid: z.string().optional(),
    name: z.string().optional(),
    activity: z.string().optional(),
    kills: z.number().int().optional(),
    deaths: z.number().int().optional(),
    assists: z.number().int().optional(),
    last_hits: z.number().int().optional(),
    denies: z.number().int().optional(),
    kill_streak: z.number().int().optional(),
    team_name: z.string().optional(),
    gold: z.number().int().optional(),
    gold_reliable: z.number().int().optional(),
    gold_unreliable: z.number().int().optional(),
    net_worth: z.number().int().optional(),
    gpm: z.number().int().optional(),
    xpm: z.number().int().optional(),
    kill_list: z.record(z.number().int().min(0)).optional(),
}).passthrough();

export const GsiHeroSchema = z.object({
    id: z.number().int().optional(),
    name: z.string().optional(),
    level: z.number().int().optional(),
    xp: z.number().int().optional(),
    alive: z.boolean().optional(),
    respawn_seconds: z.number().int().optional(),
    buyback_cost: z.number().int().optional(),
    buyback_cooldown: z.number().int().optional(),
    health: z.number().int().optional(),
    max_health: z.number().int().optional(),
    health_percent: z.number().int().optional(),
    mana: z.number().int().optional(),
    max_mana: z.number().int().optional(),
    mana_percent: z.number().int().optional(),
    xpos: z.number().int().optional(),
    ypos: z.number().int().optional(),
}).passthrough();

export const GsiAbilitySchema = z.object({
    name: z.string().optional(),
    level: z.number().int().optional(),
    can_cast: z.boolean().optional(),
    passive: z.boolean().optional(),
    ability_active: z.boolean().optional(),
    cooldown: z.number().int().optional(),
    ultimate: z.boolean().optional(),
}).passthrough();

export const GsiBuildingSchema = z.object({
    health: z.number().int(),
    max_health: z.number().int(),
}).passthrough();

export const GsiMinimapObjectSchema = z.object({
    image: z.string().default(''),
    name: z.string().optional(),
    team: z.number().int().default(0),
    unitname: z.string().optional(),
    visionrange: z.number().int().optional(),
    xpos: z.number().int(),
    ypos: z.number().int(),
    yaw: z.number().int().optional(),
}).passthrough();

// ============================================
// Root Payload
// ============================================

export const GsiPayloadSchema = z.object({
    provider: GsiProviderSchema.optional(),
    map: GsiMapSchema.optional(),
    player: GsiPlayerSchema.optional(),
    hero: GsiHeroSchema.optional(),
    abilities: z.record(GsiAbilitySchema).optional(),
    buildings: z.record(z.record(GsiBuildingSchema)).optional(),
    minimap: z.record(GsiMinimapObjectSchema).optional(),
}).passthrough();

export type GsiPayload = z.output<typeof GsiPayloadSchema>;
export type GsiMinimapObject = z.output<typeof GsiMinimapObjectSchema>;

// ============================================
// Validation
// ============================================

export type GsiValidationResult =
    | { success: true; data: GsiPayload }
    | { success: false; error: z.ZodError };

/**
 * Validate a raw payload with size limit check
 */
export function validateGsiPayload(
    input: unknown,
    maxBytes: number = GSI_LIMITS.MAX_PAYLOAD_BYTES
): GsiValidationResult {
    const jsonSize = JSON.stringify(input)?.length ?? 0;
    if (jsonSize > maxBytes) {
        return {
            success: false,
            error: new z.ZodError([{
                code: 'custom',
                message: `Payload too large: ${jsonSize} bytes (max: ${maxBytes})`,
                path: [],
            }]),
        };
    }

    const result = GsiPayloadSchema.safeParse(input);

    if (result.success) {
        return { success: true, data: result.data };
    }

    return { success: false, error: result.error };
}
