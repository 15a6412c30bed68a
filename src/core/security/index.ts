export * from './signature-verifier';
