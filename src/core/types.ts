/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

/** Screen rectangle, top-left origin, in points. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PaddingConfig {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

// ---------------------------------------------------------------------------
// Displays (sourced from `displayplacer list`)
// ---------------------------------------------------------------------------

export interface DisplayMode {
  displayId: string;                       // serial screen id, e.g. "s4251086178"
  modeId: string;                          // displayplacer mode number
  width: number;
  height: number;
  scaled: boolean;
  refreshRate: number;
  current: boolean;                        // marked "<-- current mode" in the catalog
}

export interface DisplayInfo {
  id: string;                              // the id we hand back to displayplacer
  persistentId: string;
  serialId?: string;
  type?: string;
  isMain: boolean;                         // "Origin: (0,0) - main display"
  modes: DisplayMode[];                    // catalog order
}

export interface ModeTarget {
  width: number;
  height?: number;
}

export type ModeFilter = 'scaled' | 'exact-width';

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

export interface WindowRecord {
  app: string;                             // owning application name
  pid: number;
  windowId: number;                        // CoreGraphics window number
  axIndex: number;                         // index in the app's accessibility window list
  title: string;
  frame: Rect;
}

export type SkipReason = 'app-missing' | 'window-missing' | 'rejected' | 'permission-denied';

export type ApplyOutcome =
  | { status: 'applied' }
  | { status: 'skipped'; reason: SkipReason; message?: string };

// ---------------------------------------------------------------------------
// Persisted state
// ---------------------------------------------------------------------------

export interface SavedWindow {
  app: string;
  pid: number;
  windowId: number;
  axIndex: number;
  title: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PresentationState {
  version: 1;
  displayId: string;
  originalMode: string;
  originalModeLabel: string;
  savedAt: string;                         // ISO-8601
  windows: SavedWindow[];                  // front-to-back
}

export type StateReadResult =
  | { kind: 'absent' }
  | { kind: 'corrupt'; reason: string }
  | { kind: 'present'; state: PresentationState };

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type ExitLayout = 'restore' | 'tile';

export interface DisplayProfile {
  name: string;
  presentation: ModeTarget;
}

export interface PresentationConfig {
  displayplacerPath: string;
  stateFile: string;
  logLevel: LogLevel;
  settleDelayMs: number;                   // wait after a mode switch before reading geometry
  padding: PaddingConfig;
  target: ModeTarget;                      // used when the display has no profile
  displays: Record<string, DisplayProfile>; // keyed by serial screen id
  modeFilter: ModeFilter;
  maxWidthDelta?: number;
  exitLayout: ExitLayout;
  skipApps: string[];
  minWindowSize: number;
  commandTimeoutMs: number;
}

// ---------------------------------------------------------------------------
// Collaborators the orchestrator talks to
// ---------------------------------------------------------------------------

export interface DisplayService {
  listDisplays(): Promise<DisplayInfo[]>;
  setMode(displayId: string, modeId: string): Promise<void>;
}

export interface WindowService {
  /** Name of the process the OS grants accessibility to (terminal, launcher). */
  readonly permissionHost: string;
  hasPermission(): Promise<boolean>;
  snapshot(): Promise<WindowRecord[]>;
  visibleRegion(): Promise<Rect>;
  apply(window: WindowRecord, frame: Rect): Promise<ApplyOutcome>;
}

export interface MenuBarService {
  setAutoHide(enabled: boolean): Promise<boolean>;
}

export interface StateStore {
  readonly path: string;
  read(): StateReadResult;
  write(state: PresentationState): void;
  clear(): void;
}

export interface PresentationServices {
  display: DisplayService;
  windows: WindowService;
  menuBar: MenuBarService;
  state: StateStore;
  sleep(ms: number): Promise<void>;
  now(): number;
}

// ---------------------------------------------------------------------------
// Workflow reports
// ---------------------------------------------------------------------------

export interface StepTiming {
  step: number;
  label: string;
  durationMs: number;
}

export interface SkippedWindow {
  app: string;
  windowId: number;
  title: string;
  reason: SkipReason;
  message?: string;
}

export interface WindowSummary {
  total: number;
  succeeded: number;
  skipped: number;
  skippedWindows: SkippedWindow[];
}

export interface WorkflowReport {
  workflow: 'enter' | 'exit';
  displayId: string;
  fromMode: string;                        // human-readable labels
  toMode: string;
  region?: Rect;
  windows: WindowSummary;
  warnings: string[];
  steps: StepTiming[];
  elapsedMs: number;
}

// ---------------------------------------------------------------------------
// Command module contract
// ---------------------------------------------------------------------------

export interface CommandFlags {
  verbose: boolean;
}

export interface CommandInvocation {
  command: string;
  flags: CommandFlags;
}

export interface CommandContext {
  config: PresentationConfig;
  services: PresentationServices;
  flags: CommandFlags;
}

export interface CommandModule {
  /** Unique registry key, what the user types. */
  name: string;
  description: string;
  execute(ctx: CommandContext): Promise<CommandResult>;
}

// ---------------------------------------------------------------------------
// Result envelope returned by execute()
// ---------------------------------------------------------------------------

export interface CommandResult {
  success: boolean;
  lines: string[];                         // human-readable report for stdout
  data?: unknown;
  error?: CommandError;
  durationMs: number;
}

export interface CommandError {
  code: string;                            // maps to our error taxonomy (see errors.ts)
  message: string;
  details?: Record<string, unknown>;
}
