export type ScanFinding =
  | { kind: "setuid"; path: string }
  | { kind: "setgid"; path: string }
  | { kind: "world-writable"; path: string }
  | { kind: "symlink-escape"; path: string; resolvedTarget: string };

export type PermissionFinding = Extract<
  ScanFinding,
  { kind: "setuid" | "setgid" | "world-writable" }
>;

export type SymlinkFinding = Extract<ScanFinding, { kind: "symlink-escape" }>;
