import { vi } from "vitest";
import type { FinalCatalog, RawEdition, RawSnapshot } from "../types.js";
import type { PriorSnapshotState } from "../services/diffService.js";
import type { Logger } from "../services/logger.js";
import type { RunArtifacts, SnapshotStore } from "../services/snapshotStore.js";

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function edition(overrides: Partial<RawEdition> & { id: string }): RawEdition {
  return {
    name: null,
    flavor: null,
    standfirst: null,
    color: null,
    image_url: null,
    alt_text: null,
    product_url: null,
    ...overrides
  };
}

export function austria(): RawSnapshot {
  return {
    Austria: {
      flag: "AT",
      editions: [
        edition({
          id: "summer-at",
          name: "The Summer Edition",
          flavor: "Dragon Fruit",
          standfirst: "Tastes of curuba and elderflower.",
          color: "#F5A623",
          image_url: "https://img.test/summer.png",
          alt_text: "Summer can",
          product_url: "https://shop.test/summer"
        })
      ],
      flag_url: "https://flags.test/AT.svg"
    }
  };
}

export function withGermany(snapshot: RawSnapshot): RawSnapshot {
  return {
    ...snapshot,
    Germany: {
      flag: "DE",
      editions: [
        edition({
          id: "winter-de",
          name: "The Winter Edition",
          flavor: "Fig-Apple",
          standfirst: "Fig and apple.",
          color: "#7B1E3A",
          image_url: "https://img.test/winter.png",
          alt_text: "Winter can",
          product_url: "https://shop.test/winter"
        })
      ],
      flag_url: "https://flags.test/DE.svg"
    }
  };
}

// Records every call so tests can assert commit order.
export class MemoryStore implements SnapshotStore {
  previous: PriorSnapshotState = { status: "missing" };
  staged: RawSnapshot | null = null;
  catalog: FinalCatalog | null = null;
  changelog: string | null = null;
  calls: string[] = [];
  failOn = new Set<string>();

  private record(call: string): void {
    this.calls.push(call);
    if (this.failOn.has(call)) throw new Error(`${call} failed`);
  }

  async readPrevious(): Promise<PriorSnapshotState> {
    this.record("readPrevious");
    return this.previous;
  }

  async stageCurrent(snapshot: RawSnapshot): Promise<void> {
    this.record("stageCurrent");
    this.staged = structuredClone(snapshot);
  }

  async discardCurrent(): Promise<void> {
    this.record("discardCurrent");
    this.staged = null;
  }

  // Both artifacts are staged before anything visible changes.
  async publish(artifacts: RunArtifacts, options: { promoteCurrent: boolean }): Promise<void> {
    this.record("stageCatalog");
    this.record("stageChangelog");
    this.record("publish");
    const promoted = this.staged;
    if (options.promoteCurrent && !promoted) throw new Error("nothing staged");

    this.catalog = artifacts.catalog;
    this.changelog = artifacts.changelog;
    if (options.promoteCurrent && promoted) {
      this.previous = { status: "loaded", snapshot: promoted };
      this.staged = null;
    }
  }

  async readCatalog(): Promise<string | null> {
    return this.catalog === null ? null : JSON.stringify(this.catalog);
  }

  async readChangelog(): Promise<string | null> {
    return this.changelog;
  }
}
