export type { IKeypairStore } from './keypair-store.interface.js';
export type { IPasswordProvider } from './password-provider.interface.js';
