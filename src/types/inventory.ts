/**
 * Command gateway and parser type definitions
 */

export type CommandName =
  | 'blockDevices'
  | 'physicalVolumes'
  | 'volumeGroups'
  | 'logicalVolumes'
  | 'segments'
  | 'filesystems'
  | 'partitions';

export type CommandFailure =
  | { readonly kind: 'ExecutionFailed'; readonly reason: string }
  | { readonly kind: 'PermissionDenied'; readonly detail: string }
  | { readonly kind: 'NotFound'; readonly program: string };

export type CommandOutcome =
  | { readonly ok: true; readonly stdout: string; readonly durationMs: number }
  | { readonly ok: false; readonly failure: CommandFailure; readonly durationMs: number };

/**
 * Raw output of one refresh. Commands that were not run (disabled by config) are absent.
 */
export type InventoryOutput = Readonly<Partial<Record<CommandName, CommandOutcome>>>;

export interface ParseIssue {
  line: number;
  message: string;
}

export interface ParseResult<T> {
  records: T[];
  skipped: number;
  issues: ParseIssue[];
}
