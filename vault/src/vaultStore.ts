import { chmod, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

export type VaultSlot = "secret" | "public";

/** Where the vault keeps its two records: the sealed secret and the npub. */
export interface VaultStore {
  read(slot: VaultSlot): Promise<string | null>;
  write(slot: VaultSlot, data: string): Promise<void>;
  remove(slot: VaultSlot): Promise<void>;
}

export const VAULT_FILE_NAMES: Record<VaultSlot, string> = {
  secret: ".ncrypt",
  public: "npub",
};

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class FileVaultStore implements VaultStore {
  constructor(private readonly dir: string) {}

  pathOf(slot: VaultSlot): string {
    return join(this.dir, VAULT_FILE_NAMES[slot]);
  }

  async read(slot: VaultSlot): Promise<string | null> {
    try {
      return await readFile(this.pathOf(slot), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async write(slot: VaultSlot, data: string): Promise<void> {
    await mkdir(this.dir, { recursive: true, mode: 0o700 });
    const path = this.pathOf(slot);
    await writeFile(path, data, { mode: 0o600 });
    // mode above only applies when the file is created
    await chmod(path, 0o600);
  }

  async remove(slot: VaultSlot): Promise<void> {
    await rm(this.pathOf(slot), { force: true });
  }
}

export class MemoryVaultStore implements VaultStore {
  private readonly slots = new Map<VaultSlot, string>();

  async read(slot: VaultSlot): Promise<string | null> {
    return this.slots.get(slot) ?? null;
  }

  async write(slot: VaultSlot, data: string): Promise<void> {
    this.slots.set(slot, data);
  }

  async remove(slot: VaultSlot): Promise<void> {
    this.slots.delete(slot);
  }
}
