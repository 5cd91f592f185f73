// backend/services/video-composition/geometry.ts
import {
  defaultCatalog,
  isLayout,
  isResolution,
  type Catalog,
  type Layout,
  type Resolution,
} from "./catalog.js";
import type { ResolvedGeometry } from "./types.js";

const FALLBACK_RESOLUTION: Resolution = "1080p";
const FALLBACK_LAYOUT: Layout = "16:9";

function nextEven(n: number): number {
  return n % 2 === 0 ? n : n + 1;
}

/**
 * Derives the render size for a resolution tier and aspect-ratio layout.
 *
 * The short side of the tier's reference pair is held fixed: landscape and
 * square layouts keep it as the height, portrait layouts keep it as the
 * width, and the other side follows from the ratio. Both sides are then
 * bumped to the next even integer for the encoder.
 *
 * Unknown values fall back to 1080p / 16:9. Validate first when an unknown
 * value should be rejected instead.
 */
export function resolveGeometry(
  resolution: string,
  layout: string,
  catalog: Catalog = defaultCatalog
): ResolvedGeometry {
  const tier = isResolution(resolution)
    ? catalog.resolutions[resolution]
    : catalog.resolutions[FALLBACK_RESOLUTION];
  const [rw, rh] = isLayout(layout)
    ? catalog.layouts[layout].ratio
    : catalog.layouts[FALLBACK_LAYOUT].ratio;

  const shortSide = Math.min(tier.width, tier.height);
  let width: number;
  let height: number;

  if (rw >= rh) {
    height = shortSide;
    width = Math.round((height * rw) / rh);
  } else {
    width = shortSide;
    height = Math.round((width * rh) / rw);
  }

  return Object.freeze({ width: nextEven(width), height: nextEven(height) });
}

/** Memoizes resolved geometry per (resolution, layout) pair. */
export class GeometryResolver {
  private readonly cache = new Map<string, ResolvedGeometry>();

  constructor(private readonly catalog: Catalog = defaultCatalog) {}

  resolve(resolution: string, layout: string): ResolvedGeometry {
    const cacheKey = `${resolution}|${layout}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }
    const geometry = resolveGeometry(resolution, layout, this.catalog);
    this.cache.set(cacheKey, geometry);
    return geometry;
  }

  get size(): number {
    return this.cache.size;
  }
}
