/**
 * Type definitions index - exports all types used throughout the shim
 */

export type * from './shim.js';
export type * from './ollama.js';
export type * from './openai.js';

// Environment variables
declare global {
  namespace NodeJS {
    interface ProcessEnv {
      OPENAI_API_KEY?: string;
      UPSTREAM_API_KEY?: string;
      OPENAI_API_BASE_URL?: string;
      PROXY_PORT?: string;
    }
  }
}
