// backend/services/video-composition/platform-presets.ts
import {
  defaultCatalog,
  isPlatformPresetName,
  type Catalog,
  type PresetTriple,
} from "./catalog.js";

/**
 * Expands a platform preset name to its (resolution, layout, fps) triple.
 * Returns null for names the catalog does not know.
 */
export function expandPreset(
  name: string | null | undefined,
  catalog: Catalog = defaultCatalog
): PresetTriple | null {
  if (!isPlatformPresetName(name)) {
    return null;
  }
  const { resolution, layout, fps } = catalog.platformPresets[name];
  return { resolution, layout, fps };
}

export function isCatalogTriple(
  triple: PresetTriple,
  catalog: Catalog = defaultCatalog
): boolean {
  return (
    triple.resolution in catalog.resolutions &&
    triple.layout in catalog.layouts &&
    catalog.frameRates.includes(triple.fps)
  );
}

/** Overwrites resolution, layout and fps when a known preset is named. */
export function applyPreset<
  T extends PresetTriple & { platformPreset: string | null },
>(config: T, catalog: Catalog = defaultCatalog): T {
  const triple = expandPreset(config.platformPreset, catalog);
  return triple ? { ...config, ...triple } : config;
}
