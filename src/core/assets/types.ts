/**
 * Asset build type definitions
 */

import type { VersionConstraint } from '../version/constraint.js';

export type AssetPhase = 'administration' | 'storefront';

/**
 * One asset-bearing unit: an extension or an extra bundle inside one
 */
export interface AssetSource {
  /** Technical name, used for output file names */
  name: string;
  /** The extension's Resources directory */
  resourcesDir: string;
  /** Entry file per phase, absent when the phase has no sources */
  administrationEntry?: string;
  storefrontEntry?: string;
  /** Host versions the built assets have to run on */
  constraint: VersionConstraint;
}

/**
 * Build-wide switches, passed uniformly to every source
 */
export interface AssetBuildConfig {
  disableAdministrationBuild: boolean;
  disableStorefrontBuild: boolean;
  /** Project root; required for the assets:install step */
  shopwareRoot?: string;
  /** Host version of the project; overrides each source's own constraint */
  shopwareVersion?: VersionConstraint;
  browserslist?: string;
}

export const DEFAULT_ASSET_BUILD_CONFIG: AssetBuildConfig = {
  disableAdministrationBuild: false,
  disableStorefrontBuild: false,
};

/** `skipped` when the phase has no build tooling of its own */
export type AssetBuildOutcome = 'built' | 'skipped';

/**
 * The external front-end build capability
 */
export interface AssetBuilder {
  build(
    source: AssetSource,
    phase: AssetPhase,
    config: AssetBuildConfig
  ): Promise<AssetBuildOutcome>;
}
