export interface RepositoryRecord {
  name: string;
  path: string;
}

export interface RegistryFile {
  repos: Record<string, RepositoryRecord>;
}

export type RepoHealth = "ok" | "not-a-repository" | "unreachable";
