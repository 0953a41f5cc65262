/** Body of `GET /repos/{owner}/{repo}/contents/{path}` for a single file. */
export interface ContentsFileResponse {
  type?: string;
  name?: string;
  path?: string;
  sha?: string;
  size?: number;
  encoding?: string;
  content?: string;
}

export interface RepoRef {
  owner: string;
  repo: string;
}

export type ContentResult =
  | { ok: true; status: number; content: Buffer }
  | { ok: false; status: number; message?: string };

/**
 * Anything that can hand back a decoded file from a repository. The HTTP
 * client implements it; tests use an in-memory source.
 */
export interface ContentSource {
  getFile(repo: RepoRef, path: string): Promise<ContentResult>;
}
