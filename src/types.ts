/**
 * Core types for the chat-digest library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
