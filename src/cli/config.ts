import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { MakegenError, MakegenErrorCode, type MakegenResult } from '../lib/makegen/index.js';

export interface BuildConfig {
  cxx_std: string;
  unit_extensions: string[];
  header_extensions: string[];
  exclude_dirs: string[];
  makefile_name: string;
}

const DEFAULT_BUILD_CONFIG: BuildConfig = {
  cxx_std: 'c++11',
  unit_extensions: ['.cpp'],
  header_extensions: ['.h'],
  exclude_dirs: ['.git', '.svn', '.hg'],
  makefile_name: 'Makefile',
};

interface MakegenYamlShape {
  build?: Partial<Record<keyof BuildConfig, unknown>>;
}

function configError(message: string): MakegenError {
  return new MakegenError(MakegenErrorCode.MAKEGEN_CONFIG_ERROR, message);
}

function asStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string')) {
    throw configError(`Invalid ${field}: expected array of strings`);
  }
  return value;
}

function asExtensionArray(value: unknown, field: string): string[] {
  const extensions = asStringArray(value, field);
  if (extensions.some((ext) => !/^\.[^./\\]+$/.test(ext))) {
    throw configError(`Invalid ${field}: extensions must look like ".cpp"`);
  }
  return extensions;
}

function asNonEmptyString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw configError(`Invalid ${field}: expected non-empty string`);
  }
  return value;
}

function resolveConfigPath(cwd: string, projectRoot: string, explicitConfigPath?: string): string | null {
  if (explicitConfigPath) {
    const resolved = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(resolved)) {
      throw configError(`Configuration file not found: ${resolved}`);
    }
    if (fs.statSync(resolved).isDirectory()) {
      throw configError(`Expected file, got directory: ${resolved}`);
    }
    return resolved;
  }

  const defaultConfig = path.join(projectRoot, 'makegen.yaml');
  return fs.existsSync(defaultConfig) && !fs.statSync(defaultConfig).isDirectory()
    ? defaultConfig
    : null;
}

export function loadBuildConfig(cwd: string, projectRoot: string, explicitConfigPath?: string): BuildConfig {
  const configPath = resolveConfigPath(cwd, projectRoot, explicitConfigPath);

  if (!configPath) {
    return { ...DEFAULT_BUILD_CONFIG };
  }

  let source: string;
  try {
    source = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw configError(
      `Unable to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(source);
  } catch (error) {
    throw configError(
      `Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (parsed === undefined || parsed === null) {
    return { ...DEFAULT_BUILD_CONFIG };
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw configError(`Invalid configuration in ${configPath}: expected YAML object`);
  }

  const makegenYaml = parsed as MakegenYamlShape;
  const merged: BuildConfig = {
    ...DEFAULT_BUILD_CONFIG,
  };

  const build = makegenYaml.build;
  if (build === undefined || build === null) {
    return merged;
  }

  if (typeof build !== 'object' || Array.isArray(build)) {
    throw configError(`Invalid build section in ${configPath}: expected YAML object`);
  }

  if (build.cxx_std !== undefined) {
    merged.cxx_std = asNonEmptyString(build.cxx_std, 'build.cxx_std');
  }

  if (build.unit_extensions !== undefined) {
    merged.unit_extensions = asExtensionArray(build.unit_extensions, 'build.unit_extensions');
  }

  if (build.header_extensions !== undefined) {
    merged.header_extensions = asExtensionArray(build.header_extensions, 'build.header_extensions');
  }

  if (build.exclude_dirs !== undefined) {
    merged.exclude_dirs = asStringArray(build.exclude_dirs, 'build.exclude_dirs');
  }

  if (build.makefile_name !== undefined) {
    merged.makefile_name = asNonEmptyString(build.makefile_name, 'build.makefile_name');
  }

  return merged;
}

/**
 * Failed result for a configuration error, shaped for `formatMakegenOutput`
 */
export function configFailure(error: MakegenError): MakegenResult {
  return {
    success: false,
    error: { code: error.code, message: error.message },
    makefiles: [],
    stale: [],
    warnings: [],
  };
}

/**
 * Split `-l m,pthread` into library names, keeping their order
 */
export function parseLibs(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((lib) => lib.trim())
    .filter((lib) => lib.length > 0);
}
