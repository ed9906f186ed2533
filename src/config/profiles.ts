/**
 * Per-run selection of a service descriptor and an environment profile.
 *
 * Each run receives its own frozen copy of the profile so that concurrent runs
 * never observe each other's environment.
 */

import { InvalidTargetError } from "../shared/errors.js";
import type { EnvironmentProfile, ServiceDescriptor } from "../shared/types.js";
import type { PipelineConfig } from "./loader.js";

export function selectService(config: PipelineConfig, name: string): ServiceDescriptor {
  const service = config.services.get(name);
  if (!service) {
    throw new InvalidTargetError("service", name, [...config.services.keys()]);
  }
  return service;
}

export function selectProfile(config: PipelineConfig, name: string): EnvironmentProfile {
  const profile = config.profiles.get(name);
  if (!profile) {
    throw new InvalidTargetError("environment", name, [...config.profiles.keys()]);
  }
  return snapshotProfile(profile);
}

/** Detached, frozen copy of a profile. */
export function snapshotProfile(profile: EnvironmentProfile): EnvironmentProfile {
  return Object.freeze({
    name: profile.name,
    envVars: Object.freeze({ ...profile.envVars }),
    installMode: profile.installMode,
    buildEnabled: profile.buildEnabled,
  });
}

