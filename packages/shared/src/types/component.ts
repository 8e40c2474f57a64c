export interface ComponentReference {
  name: string;            // application name (Terraform module label)
  repositoryUrl: string;
  ref: string;             // release branch / track, e.g. "track/3.4"
  subpath: string;         // Terraform module directory inside the repository
}

export type MetadataSource = 'metadata.yaml' | 'charmcraft.yaml';

export interface CharmMetadata {
  file: string;
  name: string;
  docs?: string;
  images: Record<string, string>;  // resource name -> upstream-source
  source: MetadataSource;
}

export interface LocalCharmMetadata {
  checkoutPath: string;
  metadataFile: string;    // relative to the checkout
  charmName: string;
  images: Record<string, string>;
  version?: string;        // default of the "channel" Terraform variable
}

export interface ComponentInfo {
  name: string;
  repositoryUrl: string;
  references: ComponentReference[];
  local?: LocalCharmMetadata;
}

// Registry dump (persisted as YAML)
export interface DumpedCharm {
  name: string;
  path: string;
}

export interface DumpedRepository {
  url: string;
  branch: string;
  charms: DumpedCharm[];
}

export interface RegistryDump {
  repositories: DumpedRepository[];
}
