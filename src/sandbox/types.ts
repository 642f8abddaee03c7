export type ArtifactMetadata = Record<string, string | number | boolean | undefined>;

export type SandboxRun = {
  success: boolean;
  /** Published artifact URLs; on failure, those published before it. */
  urls: string[];
  output: string;
  error?: string;
};

/** Runs generated code in isolation and publishes what it draws. */
export interface CodeSandbox {
  run(code: string, metadata?: ArtifactMetadata): Promise<SandboxRun>;
}

/** Publishes an artifact file and returns its retrievable URL. */
export interface ArtifactStore {
  readonly name: string;
  upload(filePath: string, metadata?: ArtifactMetadata): Promise<string>;
}
