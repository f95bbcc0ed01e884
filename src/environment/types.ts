export interface VirtualEnvironment {
  root: string;
  /** `bin` on POSIX, `Scripts` on Windows. */
  binDir: string;
  python: string;
}

export interface DependencyManifest {
  path: string;
  specifiers: string[];
}
