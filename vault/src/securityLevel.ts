export const SECURITY_LEVELS = ["never", "password-required", "optional-password"] as const;

export type SecurityLevel = (typeof SECURITY_LEVELS)[number];

/** Levels under which a secret key may be written to disk. */
export type PersistLevel = Exclude<SecurityLevel, "never">;

export const DEFAULT_SECURITY_LEVEL: SecurityLevel = "password-required";

export const isSecurityLevel = (value: string): value is SecurityLevel =>
  (SECURITY_LEVELS as readonly string[]).includes(value);

export const allowsPersist = (level: SecurityLevel): level is PersistLevel => level !== "never";

export const requiresPassword = (level: SecurityLevel): boolean => level === "password-required";

export const describeSecurityLevel = (level: SecurityLevel): string => {
  switch (level) {
    case "never":
      return "Never save the secret key; it lives in memory only";
    case "password-required":
      return "Save the secret key encrypted with a mandatory password";
    case "optional-password":
      return "Save the secret key encrypted with a password, which may be empty";
  }
};

// Level byte as stored in the vault record header.
const LEVEL_TAGS: Record<PersistLevel, number> = {
  "password-required": 1,
  "optional-password": 2,
};

export const levelTag = (level: PersistLevel): number => LEVEL_TAGS[level];

export const levelFromTag = (tag: number): PersistLevel | null => {
  if (tag === LEVEL_TAGS["password-required"]) return "password-required";
  if (tag === LEVEL_TAGS["optional-password"]) return "optional-password";
  return null;
};
