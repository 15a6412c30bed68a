export * from './scripted-behavior';
export * from './mock-collaborators';
