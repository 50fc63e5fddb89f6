export type Target = {
  /** Absolute path of the binary; also the key under which history is stored. */
  path: string;
  name?: string;
};

export const targetLabel = (target: Target): string =>
  target.name ? `${target.name} (${target.path})` : target.path;
