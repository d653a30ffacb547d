export * from './llm-provider.types.js';
