/**
 * User-agent catalog manager
 *
 * Owns the desktop and mobile catalogs, loaded once at construction and
 * read-only afterwards. Every read goes through the shared side of a
 * ReadWriteLock; installing the catalogs takes the exclusive side, so a
 * future reload path needs no redesign.
 *
 * Selection is uniform over catalog members. The `weight` field is carried
 * as advisory metadata and does not affect probabilities.
 */

import type {
  CatalogCounts,
  CatalogSource,
  DeviceCategory,
  RandomIndexSource,
  UserAgentEntry,
} from "@/types/catalog";
import { validateCatalogPair, validateEntry } from "@/utils/catalogValidation";
import { ReadWriteLock } from "@/utils/readWriteLock";
import * as logger from "@/logger";
import { describeSource, loadCatalogSource } from "./loader";
import { cryptoRandomIndex, secureRandomIndex } from "./secureRandom";
import { EmptyCatalogError } from "./errors";

export type UserAgentManagerOptions = {
  /** Entropy source; defaults to crypto.randomInt */
  random?: RandomIndexSource;
};

type Catalogs = Record<DeviceCategory, readonly UserAgentEntry[]>;

function freezeCatalog(entries: readonly UserAgentEntry[]): readonly UserAgentEntry[] {
  return Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
}

function copyCatalog(entries: readonly UserAgentEntry[]): UserAgentEntry[] {
  return entries.map((entry) => ({ ...entry }));
}

export class UserAgentManager {
  private readonly lock = new ReadWriteLock("user-agent-catalogs");
  private readonly randomSource: RandomIndexSource;
  private catalogs: Catalogs = { desktop: [], mobile: [] };

  private constructor(
    desktop: UserAgentEntry[],
    mobile: UserAgentEntry[],
    options: UserAgentManagerOptions,
  ) {
    this.randomSource = options.random ?? cryptoRandomIndex;
    this.lock.write(() => {
      this.catalogs = {
        desktop: freezeCatalog(desktop),
        mobile: freezeCatalog(mobile),
      };
    });
  }

  /**
   * Load both catalogs and build a manager. All-or-nothing.
   *
   * @throws {CatalogSourceNotFoundError} If a source path is empty or unreadable
   * @throws {CatalogParseError} If a source is not a JSON array
   * @throws {CatalogValidationError} If any record is invalid, or both catalogs are empty
   *
   * @example
   * const manager = UserAgentManager.load(
   *   { type: "file", path: "data/desktop_useragents.json" },
   *   { type: "file", path: "data/mobile_useragents.json" },
   * );
   * manager.randomDesktopText();
   */
  static load(
    desktopSource: CatalogSource,
    mobileSource: CatalogSource,
    options: UserAgentManagerOptions = {},
  ): UserAgentManager {
    const desktop = loadCatalogSource(desktopSource, "desktop");
    const mobile = loadCatalogSource(mobileSource, "mobile");
    validateCatalogPair(desktop, mobile);

    logger.info("User-agent catalogs loaded", {
      desktop: desktop.length,
      mobile: mobile.length,
      desktopSource: describeSource(desktopSource),
      mobileSource: describeSource(mobileSource),
    });

    return new UserAgentManager(desktop, mobile, options);
  }

  /**
   * Build a manager from in-memory entries, with the same validation as load().
   *
   * @throws {CatalogValidationError}
   */
  static fromEntries(
    desktop: readonly UserAgentEntry[],
    mobile: readonly UserAgentEntry[],
    options: UserAgentManagerOptions = {},
  ): UserAgentManager {
    const validDesktop = desktop.map((entry, index) => validateEntry(entry, "desktop", index));
    const validMobile = mobile.map((entry, index) => validateEntry(entry, "mobile", index));
    validateCatalogPair(validDesktop, validMobile);
    return new UserAgentManager(validDesktop, validMobile, options);
  }

  /** Copy of the desktop catalog; mutating it never affects the manager */
  allDesktop(): UserAgentEntry[] {
    return this.lock.read(() => copyCatalog(this.catalogs.desktop));
  }

  /** Copy of the mobile catalog; mutating it never affects the manager */
  allMobile(): UserAgentEntry[] {
    return this.lock.read(() => copyCatalog(this.catalogs.mobile));
  }

  all(category: DeviceCategory): UserAgentEntry[] {
    return category === "desktop" ? this.allDesktop() : this.allMobile();
  }

  counts(): CatalogCounts {
    return this.lock.read(() => ({
      desktop: this.catalogs.desktop.length,
      mobile: this.catalogs.mobile.length,
    }));
  }

  /**
   * @throws {EmptyCatalogError}
   * @throws {RandomSourceError}
   */
  randomDesktop(): UserAgentEntry {
    return this.pickFrom("desktop");
  }

  /**
   * @throws {EmptyCatalogError}
   * @throws {RandomSourceError}
   */
  randomMobile(): UserAgentEntry {
    return this.pickFrom("mobile");
  }

  random(category: DeviceCategory): UserAgentEntry {
    return this.pickFrom(category);
  }

  /**
   * Uniform pick over desktop ++ mobile: each entry counts once, so each
   * catalog is chosen in proportion to its size.
   *
   * @throws {EmptyCatalogError} If both catalogs are empty
   * @throws {RandomSourceError}
   */
  randomAny(): UserAgentEntry {
    return this.lock.read(() => {
      const { desktop, mobile } = this.catalogs;
      const total = desktop.length + mobile.length;
      if (total === 0) {
        throw new EmptyCatalogError("any");
      }

      const index = secureRandomIndex(total, this.randomSource);
      const entry = index < desktop.length ? desktop[index] : mobile[index - desktop.length];
      return { ...entry };
    });
  }

  randomDesktopText(): string {
    return this.randomDesktop().text;
  }

  randomMobileText(): string {
    return this.randomMobile().text;
  }

  randomAnyText(): string {
    return this.randomAny().text;
  }

  private pickFrom(category: DeviceCategory): UserAgentEntry {
    return this.lock.read(() => {
      const entries = this.catalogs[category];
      if (entries.length === 0) {
        throw new EmptyCatalogError(category);
      }

      const index = secureRandomIndex(entries.length, this.randomSource);
      return { ...entries[index] };
    });
  }
}
