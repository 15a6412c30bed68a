export * from './http-json.client';
export * from './http-enrichment.provider';
export * from './http-content.generator';
