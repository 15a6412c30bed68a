export * from './message-splitter';
export * from './telegram.notifier';
