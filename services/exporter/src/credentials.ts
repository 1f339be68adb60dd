/** A named API key. A credential without a secret is still tried, unauthenticated. */
export interface Credential {
  label: string;
  secret?: string;
}

export const PRIMARY_LABEL = "primary";
export const BACKUP_LABEL  = "backup";

/** Ordered failover list: primary first, then backup. */
export function buildCredentialSet(primary?: string, backup?: string): Credential[] {
  return [
    { label: PRIMARY_LABEL, secret: primary },
    { label: BACKUP_LABEL,  secret: backup },
  ];
}
