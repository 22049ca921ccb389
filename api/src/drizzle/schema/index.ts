export * from './users';
export * from './procedure-types';
export * from './events';
export * from './applications';
export * from './application-photos';
export * from './day-summary-messages';
export * from './app-settings';
