// Re-exports for all CLI types
export * from './command-options';
