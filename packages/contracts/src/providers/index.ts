import type { MapSkeleton } from "../schemas/map-skeleton";
import type { GenerationProfile } from "../schemas/profile";
import { GenerationError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Source of named generation profiles. Storage lives outside the engine;
 * implementations hand over already validated profiles.
 */
export interface ProfileProvider {
  profiles(): ReadonlyMap<string, GenerationProfile>;
}

export interface MapSkeletonProvider {
  skeletons(): ReadonlyMap<string, MapSkeleton>;
}

function byName<T extends { name: string }>(
  entries: readonly T[],
): ReadonlyMap<string, T> {
  const map = new Map<string, T>();
  for (const entry of entries) {
    map.set(entry.name, entry);
  }
  return map;
}

export function createStaticProfileProvider(
  profiles: readonly GenerationProfile[],
): ProfileProvider {
  const map = byName(profiles);
  return { profiles: () => map };
}

export function createStaticSkeletonProvider(
  skeletons: readonly MapSkeleton[],
): MapSkeletonProvider {
  const map = byName(skeletons);
  return { skeletons: () => map };
}

export function resolveProfile(
  provider: ProfileProvider,
  name: string,
): Result<GenerationProfile, GenerationError> {
  const profile = provider.profiles().get(name);
  if (!profile) {
    return Err(
      GenerationError.configInvalid(`Unknown generation profile "${name}"`, {
        parameter: "profile",
        available: [...provider.profiles().keys()],
      }),
    );
  }
  return Ok(profile);
}

export function resolveSkeleton(
  provider: MapSkeletonProvider,
  name: string,
): Result<MapSkeleton, GenerationError> {
  const skeleton = provider.skeletons().get(name);
  if (!skeleton) {
    return Err(
      GenerationError.configInvalid(`Unknown map skeleton "${name}"`, {
        parameter: "skeleton",
        available: [...provider.skeletons().keys()],
      }),
    );
  }
  return Ok(skeleton);
}
