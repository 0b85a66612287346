/** Injection token for the {@link KeyStore} implementation. */
export const KEY_STORE = 'SEALMAIL_KEY_STORE';
