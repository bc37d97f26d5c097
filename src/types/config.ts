/**
 * Configuration document and logical model types.
 */

export type PackageManagerName = 'apt' | 'flatpak' | 'snap';

export const PACKAGE_MANAGERS: readonly PackageManagerName[] = ['apt', 'flatpak', 'snap'];

/** A parsed YAML value: scalars, ordered sequences and string-keyed maps. */
export type DocumentValue =
  | string
  | number
  | boolean
  | null
  | DocumentValue[]
  | { [key: string]: DocumentValue };

export type DocumentMap = { [key: string]: DocumentValue };

export type ConditionType = 'os' | 'hostname' | 'env' | 'file_exists' | 'dir_exists';

export type ConditionOperator = 'equals' | 'not_equals' | 'contains' | 'not_contains' | 'matches';

export interface IncludeCondition {
  type: ConditionType;
  operator: ConditionOperator;
  value: string;
}

interface IncludeDirectiveBase {
  optional: boolean;
  conditions: IncludeCondition[];
  description?: string;
}

export interface PathIncludeDirective extends IncludeDirectiveBase {
  kind: 'path';
  path: string;
}

export interface GlobIncludeDirective extends IncludeDirectiveBase {
  kind: 'glob';
  pattern: string;
}

export type IncludeDirective = PathIncludeDirective | GlobIncludeDirective;

/**
 * A single configuration document loaded from disk.
 */
export interface ConfigDocument {
  /** Absolute source path */
  path: string;
  /** Parent directory, used to resolve relative paths declared inside the document */
  dir: string;
  raw: string;
  data: DocumentMap;
  includes: IncludeDirective[];
  /** Nanosecond modification time taken before the content was read; absent for in-memory documents */
  modTimeNs?: string;
}

export interface ResolvedConfigSet {
  /** Absolute document paths in resolution (pre-order) order; the root is first */
  paths: string[];
  documents: ConfigDocument[];
  visited: ReadonlySet<string>;
}

export interface PackageEntry {
  name: string;
  /** Entry-specific flags; empty means "use defaults" */
  flags: string[];
}

export interface FileEntry {
  source: string;
  destination: string;
  /** Directory of the document that declared the entry; relative sources resolve against it */
  sourceDir: string;
  /** Deploy as a copy instead of a symlink */
  copy: boolean;
  backup: boolean;
  interactive: boolean;
  owner?: string;
  group?: string;
  mode?: string;
}

export interface BinaryEntry {
  /** http(s) URL or local path */
  source: string;
  destination: string;
  sourceDir: string;
  backup: boolean;
  interactive: boolean;
  owner?: string;
  group?: string;
  mode?: string;
}

export type PackageLists = Record<PackageManagerName, PackageEntry[]>;

/**
 * The merged configuration model consumed by convergence.
 */
export interface LogicalConfig {
  version: string;
  packageDefaults: Record<string, string[]>;
  packages: PackageLists;
  files: Record<string, FileEntry>;
  binaries: Record<string, BinaryEntry>;
  dconf: {
    settings: Record<string, string>;
  };
}

/**
 * The fields a single document contributes before merging.
 * Absent fields are not declared by the document.
 */
export interface ConfigFragment {
  version?: string;
  packageDefaults?: Record<string, string[]>;
  packages?: Partial<PackageLists>;
  files?: Record<string, FileEntry>;
  binaries?: Record<string, BinaryEntry>;
  dconfSettings?: Record<string, string>;
}
