export { createMockLogger } from '@crossurls/app-server/testing';

export const MAIN_URL = 'https://main.example.org';
export const ARCHIVE_URL = 'https://archive.example.org';
