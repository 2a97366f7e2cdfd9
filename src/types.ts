// steadyhand types
// Data model shared by the gate, indexer, tracker, controller and contract engine,
// plus the capabilities the engine consumes from its host.

// --- Geometry ---

export type Region = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type Point = {
  x: number;
  y: number;
};

// --- Elements ---

export type InteractiveElement = {
  /** DOM id when present, otherwise a positional ref (e1, e2, ...) */
  id: string;
  tag: string;
  role: string;
  /** Visible text, original casing */
  text: string;
  /** Trimmed, whitespace-collapsed, case-folded text used for matching */
  normalizedText: string;
  label?: string;
  placeholder?: string;
  bounds?: Region;
  selector: string;
  /** Structural path (nth-of-type chain or role/nth for accessibility trees) */
  path: string;
  disabled: boolean;
};

export type PerceivedElement = InteractiveElement & {
  confidence: number;
};

export type DetectionMethod = "structural" | "perceptual" | "combined";

// --- Observations ---

export type ObservationFlags = {
  /** true when the hash came from markup, false when it came from a frame */
  structural: boolean;
  /** a dismissible overlay (consent banner, modal) was present */
  overlay: boolean;
};

export type Observation = {
  surfaceId: string;
  timestamp: number;   // ms since epoch
  hash: string;
  /** grid x grid grayscale thumbnail, row-major */
  fingerprint?: Uint8Array;
  selectors: string[];
  flags: ObservationFlags;
};

export type StateDiff = {
  added: string[];
  removed: string[];
  changed: boolean;
  hashChanged: boolean;
  overlayAppeared: boolean;
  overlayCleared: boolean;
};

// --- Screen contract ---

export type AnchorType = "text" | "element" | "template";

export type AnchorResult = {
  name: string;
  type: AnchorType;
  expectedLocation?: string;
  found: boolean;
  confidence: number;
  method?: DetectionMethod;
  bounds?: Region;
};

export type ScreenElement = InteractiveElement & {
  name: string;
  confidence: number;
  method: DetectionMethod;
};

export type ScreenState = {
  id: string;
  surfaceId: string;
  timestamp: number;
  anchors: readonly AnchorResult[];
  elements: readonly ScreenElement[];
  warnings: readonly string[];
  missing: readonly string[];
};

// --- Controller actions ---

export type TargetDescriptor = {
  selector?: string;
  text?: string;
  role?: string;
  /** Free-form description handed to the perception backend */
  description?: string;
  /** Restrict perceptual lookup to this region */
  region?: Region;
  /** Surface coordinates of an earlier perceptual hit; acted on without a new locate */
  point?: Point;
};

export type ActionTarget = string | TargetDescriptor;

export type ExpectedOutcome = {
  changed?: boolean;
  textPresent?: string;
  selectorPresent?: string;
};

export type ControllerAction = {
  type: "click" | "type" | "scroll";
  target?: ActionTarget;
  params?: {
    text?: string;
    clear?: boolean;
    pressEnter?: boolean;
    dx?: number;
    dy?: number;
  };
  expectedOutcome?: ExpectedOutcome;
};

export type ExecutionMethod = "structural" | "perceptual";

// --- External capabilities ---

export type CallOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/** Structural (DOM / accessibility) driver. TNode is the driver's node handle. */
export interface StructuralDriver<TNode = unknown> {
  queryAll(selector: string, opts?: CallOptions): Promise<TNode[]>;
  click(node: TNode, opts?: CallOptions): Promise<void>;
  fill(node: TNode, text: string, opts?: CallOptions): Promise<void>;
  getMarkup(opts?: CallOptions): Promise<string>;
  /** Encoded image (PNG/JPEG) of the surface or of a region of it */
  screenshot(region?: Region, opts?: CallOptions): Promise<Buffer>;
  /** Scroll a node into view, or the surface by (dx, dy) when node is null */
  scroll?(node: TNode | null, dx: number, dy: number, opts?: CallOptions): Promise<void>;
  inputValue?(node: TNode, opts?: CallOptions): Promise<string>;
  /** Press a key (e.g. "Enter") with the node focused */
  press?(node: TNode, key: string, opts?: CallOptions): Promise<void>;
}

export type LocateResult = Point & {
  confidence: number;
};

export interface PerceptionBackend {
  locate(image: Buffer, description: string, opts?: CallOptions): Promise<LocateResult | null>;
  describeRegion(image: Buffer, opts?: CallOptions): Promise<PerceivedElement[]>;
}

export interface InputBackend {
  moveTo(x: number, y: number): Promise<void>;
  click(x: number, y: number): Promise<void>;
  typeText(text: string): Promise<void>;
  scroll(dx: number, dy: number): Promise<void>;
  /** CSS-style cursor name at the current pointer position, e.g. "pointer", "text" */
  cursorType?(): Promise<string>;
}

/** Source of encoded frames for the change gate. */
export type FrameSource = (region?: Region) => Promise<Buffer>;
