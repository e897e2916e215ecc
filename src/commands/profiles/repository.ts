import { joinKeyPath, type RegistryStore } from "../../store/types";
import type { ProfileEntry } from "./types";

export type ProfileRepositoryKeys = {
  profileList: string;
  profileGuid: string;
};

const IMAGE_PATH_VALUE = "ProfileImagePath";
const CORRELATION_VALUE = "Guid";

export class ProfileRepository {
  constructor(
    private readonly store: RegistryStore,
    readonly keys: ProfileRepositoryKeys,
  ) {}

  /** Every child of the ProfileList key, in the store's enumeration order. */
  async listProfiles(): Promise<ProfileEntry[]> {
    const entries: ProfileEntry[] = [];

    for (const handle of await this.store.listChildren(this.keys.profileList)) {
      const properties = await this.store.readProperties(handle);
      const correlationId = properties[CORRELATION_VALUE]?.trim();

      entries.push({
        identity: handle.name,
        imagePath: properties[IMAGE_PATH_VALUE] ?? "",
        correlationId: correlationId ? correlationId : undefined,
        location: handle.path,
      });
    }

    return entries;
  }

  secondaryLocation(correlationId: string): string {
    return joinKeyPath(this.keys.profileGuid, correlationId);
  }

  async secondaryExists(correlationId: string): Promise<boolean> {
    return this.store.exists(this.secondaryLocation(correlationId));
  }

  async deletePrimary(entry: ProfileEntry): Promise<void> {
    await this.store.deleteRecursive(entry.location);
  }

  async deleteSecondary(correlationId: string): Promise<void> {
    await this.store.deleteRecursive(this.secondaryLocation(correlationId));
  }
}
