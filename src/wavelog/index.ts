/**
 * Wavelog module - HTTP transport for contact records
 */

export { WavelogClient, WavelogResponseSchema, USER_AGENT } from './WavelogClient';
export type { WavelogClientConfig, WavelogPayload, WavelogResponse } from './WavelogClient';
