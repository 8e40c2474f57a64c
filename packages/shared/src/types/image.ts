export type ImagePlatform = 'docker.io' | 'ghcr.io';

export interface ImageReference {
  platform: ImagePlatform;
  namespace: string;
  name: string;
  tag: string;
}

export interface TagMetadata {
  name: string;
  lastUpdated: string;
  status: string;
  architectures: string[];
}

export interface ImageTagDelta {
  repository: string;
  component: string;
  resource: string;
  image: string;
  declaredTag: string;
  latestTag: string;
}
