import type {
  AppConfig,
  DetailTab,
  FocusArea,
  RunData,
  RunManifest,
  Span,
  SpanForest,
  SpanNode,
  TraceMetrics,
  ViewMode,
} from "@spanscope/contracts";
import { DETAIL_TABS, FOCUS_AREAS } from "@spanscope/contracts";
import { DEFAULT_CONFIG } from "./config.js";
import { detailLines, metadataLines } from "./explorerView.js";
import { computeTraceMetrics, estimateCost, isErrorSpan } from "./metrics.js";
import { friendlyName } from "./parsers/spans.js";
import { allNodesPreorder, buildSpanForest, expandAncestors, flattenForest } from "./tree.js";

export type ExplorerAction = "quit" | null;

export interface SearchState {
  /** Typing a query; every key goes to the input. */
  active: boolean;
  input: string;
  /** Last committed query. */
  query: string;
  /** Node keys in flattened-list order at commit time. */
  matches: string[];
  index: number;
}

export interface ExplorerState {
  runs: RunData[];
  hasRunList: boolean;
  runCursor: number;
  selectedRun: number;
  view: ViewMode;
  focus: FocusArea;
  tab: DetailTab;
  forest: SpanForest;
  visible: SpanNode[];
  cursor: number;
  metrics: TraceMetrics;
  estimatedCost: number;
  search: SearchState;
  detailScroll: number;
  metadataScroll: number;
  width: number;
  height: number;
  live: boolean;
  lastUpdateMs: number | null;
}

export interface ExplorerOptions {
  config?: AppConfig;
  /** Single-run mode: no run list, `esc` quits. */
  hasRunList?: boolean;
  live?: boolean;
  width?: number;
  height?: number;
}

const TAB_KEYS: Record<string, DetailTab> = {
  "1": "overview",
  "2": "prompt",
  "3": "response",
  "4": "attributes",
  "5": "timing",
};

function cycle<T>(items: readonly T[], current: T, step: number): T {
  const index = items.indexOf(current);
  const next = (index + step + items.length) % items.length;
  return items[next] ?? current;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Case-insensitive substring match over names, attributes and status. */
export function nodeMatchesQuery(node: SpanNode, query: string): boolean {
  const needle = query.toLowerCase();
  if (!needle) return false;
  const haystacks = [node.span.name, friendlyName(node.span), node.span.status.code, node.span.status.description];
  for (const [key, value] of Object.entries(node.span.attrs)) {
    haystacks.push(key, String(value));
  }
  return haystacks.some((text) => text.toLowerCase().includes(needle));
}

function emptySearch(): SearchState {
  return { active: false, input: "", query: "", matches: [], index: -1 };
}

/**
 * Keyboard-driven state for the run list, trace tree and detail views. One instance is
 * owned by the render loop; `handleKey` mutates it synchronously and the caller renders
 * from `state` afterwards.
 */
export class TraceExplorer {
  private readonly config: AppConfig;
  private readonly s: ExplorerState;

  constructor(runs: RunData[], options: ExplorerOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    const hasRunList = options.hasRunList ?? true;
    const forest: SpanForest = { nodes: [], roots: [] };
    this.s = {
      runs,
      hasRunList,
      runCursor: 0,
      selectedRun: 0,
      view: hasRunList ? "run_list" : "tree",
      focus: "tree",
      tab: "overview",
      forest,
      visible: [],
      cursor: 0,
      metrics: computeTraceMetrics(forest),
      estimatedCost: 0,
      search: emptySearch(),
      detailScroll: 0,
      metadataScroll: 0,
      width: options.width ?? 120,
      height: options.height ?? 40,
      live: options.live ?? false,
      lastUpdateMs: null,
    };
    if (runs.length > 0) {
      this.loadRun(0);
    }
  }

  get state(): Readonly<ExplorerState> {
    return this.s;
  }

  get manifest(): RunManifest | undefined {
    return this.s.runs[this.s.selectedRun]?.manifest;
  }

  get previewChars(): number {
    return this.config.explorer.contentPreviewChars;
  }

  get perTokenUsd(): number {
    return this.config.cost.perTokenUsd;
  }

  selectedNode(): SpanNode | undefined {
    return this.s.visible[this.s.cursor];
  }

  matchKeys(): ReadonlySet<string> {
    return new Set(this.s.search.matches);
  }

  resize(width: number, height: number): void {
    this.s.width = Math.max(1, Math.trunc(width));
    this.s.height = Math.max(1, Math.trunc(height));
  }

  handleKey(key: string): ExplorerAction {
    if (key === "ctrl+c") return "quit";
    switch (this.s.view) {
      case "run_list":
        return this.handleRunListKey(key);
      case "tree":
        return this.s.search.active ? this.handleSearchKey(key) : this.handleTreeKey(key);
      case "detail":
        return this.handleDetailKey(key);
    }
  }

  /**
   * Replaces the current run's spans with `spans` (the full list, not a delta) and rebuilds
   * the forest and metrics. Collapsed nodes, the selection and committed search matches are
   * carried over by node key.
   */
  ingestSpans(spans: Span[], nowMs: number = Date.now()): void {
    const run = this.s.runs[this.s.selectedRun];
    if (!run) return;

    const collapsed = new Set(this.s.forest.nodes.filter((node) => !node.expanded).map((node) => node.key));
    const selectedKey = this.selectedNode()?.key;
    const currentMatch = this.s.search.matches[this.s.search.index];

    run.spans = spans;
    run.manifest = { ...run.manifest, spanCount: spans.length };
    this.rebuild(spans);
    for (const node of this.s.forest.nodes) {
      if (collapsed.has(node.key)) node.expanded = false;
    }
    this.reflatten();

    if (selectedKey !== undefined) {
      const index = this.s.visible.findIndex((node) => node.key === selectedKey);
      if (index >= 0) this.s.cursor = index;
    }
    this.s.cursor = clamp(this.s.cursor, 0, Math.max(0, this.s.visible.length - 1));

    if (this.s.search.query) {
      this.s.search.matches = this.computeMatches(this.s.search.query);
      this.s.search.index = currentMatch === undefined ? -1 : this.s.search.matches.indexOf(currentMatch);
    }
    this.s.lastUpdateMs = nowMs;
  }

  private rebuild(spans: Span[]): void {
    this.s.forest = buildSpanForest(spans);
    this.s.metrics = computeTraceMetrics(this.s.forest);
    this.s.estimatedCost = estimateCost(this.s.metrics.totalTokens, this.config.cost);
    this.reflatten();
  }

  private reflatten(): void {
    this.s.visible = flattenForest(this.s.forest);
  }

  private loadRun(index: number): void {
    const run = this.s.runs[index];
    if (!run) return;
    this.s.selectedRun = index;
    this.rebuild(run.spans);
    this.s.cursor = 0;
    this.s.search = emptySearch();
    this.s.detailScroll = 0;
    this.s.metadataScroll = 0;
  }

  private handleRunListKey(key: string): ExplorerAction {
    switch (key) {
      case "q":
        return "quit";
      case "up":
      case "k":
        this.s.runCursor = Math.max(0, this.s.runCursor - 1);
        break;
      case "down":
      case "j":
        this.s.runCursor = clamp(this.s.runCursor + 1, 0, Math.max(0, this.s.runs.length - 1));
        break;
      case "enter":
      case "l":
      case "right":
        if (this.s.runCursor < this.s.runs.length) {
          this.loadRun(this.s.runCursor);
          this.s.view = "tree";
        }
        break;
    }
    return null;
  }

  private handleTreeKey(key: string): ExplorerAction {
    const tab = TAB_KEYS[key];
    if (tab) {
      this.selectTab(tab);
      return null;
    }

    switch (key) {
      case "q":
        return "quit";
      case "esc":
      case "backspace":
        if (!this.s.hasRunList) return "quit";
        this.s.runCursor = this.s.selectedRun;
        this.s.view = "run_list";
        break;
      case "tab":
        this.s.focus = cycle(FOCUS_AREAS, this.s.focus, 1);
        break;
      case "shift+tab":
        this.s.focus = cycle(FOCUS_AREAS, this.s.focus, -1);
        break;
      case "left":
        this.selectTab(cycle(DETAIL_TABS, this.s.tab, -1));
        break;
      case "right":
        this.selectTab(cycle(DETAIL_TABS, this.s.tab, 1));
        break;
      case "up":
      case "k":
        this.moveVertical(-1);
        break;
      case "down":
      case "j":
        this.moveVertical(1);
        break;
      case "enter":
      case "l":
        this.openOrToggle();
        break;
      case "space":
      case " ":
        this.toggleSelected();
        break;
      case "h":
        this.collapseOrParent();
        break;
      case "d":
        if (this.selectedNode()) this.openDetail();
        break;
      case "/":
        this.s.search.active = true;
        this.s.search.input = "";
        break;
      case "n":
        this.stepMatch(1);
        break;
      case "N":
        this.stepMatch(-1);
        break;
      case "e":
        this.jumpToError(1);
        break;
      case "E":
        this.jumpToError(-1);
        break;
      case "[":
        this.switchRun(-1);
        break;
      case "]":
        this.switchRun(1);
        break;
    }
    return null;
  }

  private handleSearchKey(key: string): ExplorerAction {
    const search = this.s.search;
    switch (key) {
      case "esc":
        search.active = false;
        search.input = "";
        break;
      case "enter":
        search.active = false;
        this.commitSearch(search.input);
        break;
      case "backspace":
        search.input = Array.from(search.input).slice(0, -1).join("");
        break;
      case "space":
        search.input += " ";
        break;
      default:
        if (Array.from(key).length === 1) search.input += key;
    }
    return null;
  }

  private handleDetailKey(key: string): ExplorerAction {
    const tab = TAB_KEYS[key];
    if (tab) {
      this.selectTab(tab);
      return null;
    }

    switch (key) {
      case "q":
        return "quit";
      case "esc":
      case "backspace":
        this.s.view = "tree";
        break;
      case "left":
        this.selectTab(cycle(DETAIL_TABS, this.s.tab, -1));
        break;
      case "right":
        this.selectTab(cycle(DETAIL_TABS, this.s.tab, 1));
        break;
      case "up":
      case "k":
        this.s.detailScroll = Math.max(0, this.s.detailScroll - 1);
        break;
      case "down":
      case "j":
        this.s.detailScroll = clamp(this.s.detailScroll + 1, 0, this.maxDetailScroll());
        break;
    }
    return null;
  }

  private maxDetailScroll(): number {
    const lines = detailLines(this.selectedNode(), this.s.tab, this.s.forest, this.previewChars);
    return Math.max(0, lines.length - 1);
  }

  private maxMetadataScroll(): number {
    const lines = metadataLines(this.selectedNode(), this.s.forest, this.perTokenUsd);
    return Math.max(0, lines.length - 1);
  }

  private selectTab(tab: DetailTab): void {
    this.s.tab = tab;
    this.s.detailScroll = 0;
  }

  private openDetail(): void {
    this.s.view = "detail";
    this.s.detailScroll = 0;
  }

  private setCursor(index: number): void {
    const next = clamp(index, 0, Math.max(0, this.s.visible.length - 1));
    if (next !== this.s.cursor) {
      this.s.detailScroll = 0;
      this.s.metadataScroll = 0;
    }
    this.s.cursor = next;
  }

  /** Arrow keys act on whichever panel has focus; the tree cursor never wraps. */
  private moveVertical(step: number): void {
    switch (this.s.focus) {
      case "tree":
        this.setCursor(this.s.cursor + step);
        break;
      case "details":
        this.s.detailScroll = clamp(this.s.detailScroll + step, 0, this.maxDetailScroll());
        break;
      case "metadata":
        this.s.metadataScroll = clamp(this.s.metadataScroll + step, 0, this.maxMetadataScroll());
        break;
    }
  }

  private toggleSelected(): void {
    const node = this.selectedNode();
    if (!node || node.children.length === 0) return;
    node.expanded = !node.expanded;
    this.reflatten();
  }

  private openOrToggle(): void {
    const node = this.selectedNode();
    if (!node) return;
    if (node.children.length > 0) {
      this.toggleSelected();
    } else {
      this.openDetail();
    }
  }

  private collapseOrParent(): void {
    const node = this.selectedNode();
    if (!node) return;
    if (node.children.length > 0 && node.expanded) {
      node.expanded = false;
      this.reflatten();
      return;
    }
    if (node.parent === null) return;
    const parentIndex = this.s.visible.findIndex((candidate) => candidate.index === node.parent);
    if (parentIndex >= 0) this.setCursor(parentIndex);
  }

  /** Expands every collapsed ancestor so the node is listed, then selects it. */
  private revealAndSelect(node: SpanNode): void {
    expandAncestors(this.s.forest, node.index);
    this.reflatten();
    const index = this.s.visible.findIndex((candidate) => candidate.index === node.index);
    if (index >= 0) this.setCursor(index);
    this.s.focus = "tree";
  }

  private computeMatches(query: string): string[] {
    return this.s.visible.filter((node) => nodeMatchesQuery(node, query)).map((node) => node.key);
  }

  private commitSearch(query: string): void {
    const search = this.s.search;
    search.input = "";
    search.query = query;
    search.matches = query ? this.computeMatches(query) : [];
    search.index = search.matches.length > 0 ? 0 : -1;
    this.jumpToMatch();
  }

  private stepMatch(step: number): void {
    const search = this.s.search;
    const count = search.matches.length;
    if (count === 0) return;
    search.index = search.index < 0 ? (step > 0 ? 0 : count - 1) : (search.index + step + count) % count;
    this.jumpToMatch();
  }

  private jumpToMatch(): void {
    const key = this.s.search.matches[this.s.search.index];
    if (key === undefined) return;
    const node = this.s.forest.nodes.find((candidate) => candidate.key === key);
    if (node) this.revealAndSelect(node);
  }

  /** Walks the full pre-order list, so errors under collapsed nodes are reachable too. */
  private jumpToError(step: number): void {
    if (this.s.metrics.errorCount === 0) return;
    const ordered = allNodesPreorder(this.s.forest);
    const current = this.selectedNode();
    const start = current ? ordered.findIndex((node) => node.index === current.index) : -1;
    const count = ordered.length;
    for (let offset = 1; offset <= count; offset += 1) {
      const position = (((start + step * offset) % count) + count) % count;
      const candidate = ordered[position];
      if (candidate && isErrorSpan(candidate.span)) {
        this.revealAndSelect(candidate);
        return;
      }
    }
  }

  private switchRun(step: number): void {
    if (!this.s.hasRunList) return;
    const next = this.s.selectedRun + step;
    if (next < 0 || next >= this.s.runs.length) return;
    this.s.runCursor = next;
    this.loadRun(next);
  }
}
