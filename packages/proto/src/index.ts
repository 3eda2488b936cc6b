export * from './api/auth';
export * from './api/user';
export * from './api/contact';
