import packageJson from '../package.json';

export const CLIENT_NAME = 'crossref-client';
export const CLIENT_VERSION: string = packageJson.version;
export const CLIENT_PRODUCT_TOKEN = `${CLIENT_NAME}/${CLIENT_VERSION}`;
