/**
 * Turns one sealed record shape into its plaintext counterpart.
 *
 * Implementations copy plain fields through, unseal each sealed field that is present and
 * recurse into child records in order. Any failure aborts the whole record.
 */
export interface EntityUnsealer<Sealed, Unsealed> {
  unseal(sealed: Sealed): Unsealed;
}
