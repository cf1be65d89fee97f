import type { CommentMetadata, DiffFile, FileStatus, LoadingState, Review } from '@local-review/shared';
import type { AppEvent } from '../events/event';
import type { KeyInput } from '../keyboard/keys';
import { findBinding, KEY, type Keybinding } from '../keyboard/keymap';
import type { RefreshOutcome } from '../sync/types';
import { parseDiffLines, type DiffLine } from './diffLines';
import { clampIndex, SELECTION_INDICATOR, type View, type ViewContext, type ViewRender } from './view';

type DetailsAction =
  | 'up'
  | 'down'
  | 'not_viewed'
  | 'viewed'
  | 'toggle_viewed'
  | 'line_mode'
  | 'comments'
  | 'refresh'
  | 'back'
  | 'help';

export type FileList = 'not_viewed' | 'viewed';

const BINDINGS: Keybinding<DetailsAction>[] = [
  { id: 'up', label: 'Move up', combos: KEY.up },
  { id: 'down', label: 'Move down', combos: KEY.down },
  {
    id: 'not_viewed',
    label: 'Show files not viewed',
    combos: [
      { key: 'h', displayKeys: ['h'] },
      { key: 'left', displayKeys: ['←'] },
    ],
  },
  {
    id: 'viewed',
    label: 'Show viewed files',
    combos: [
      { key: 'l', displayKeys: ['l'] },
      { key: 'right', displayKeys: ['→'] },
    ],
  },
  { id: 'toggle_viewed', label: 'Toggle viewed', combos: [{ key: ' ', displayKeys: ['Space'] }] },
  { id: 'line_mode', label: 'Browse lines of the file', combos: KEY.enter },
  { id: 'comments', label: 'Comments', combos: [{ key: 'c', displayKeys: ['c'] }] },
  { id: 'refresh', label: 'Refresh review', combos: [{ key: 'r', displayKeys: ['r'] }] },
  { id: 'back', label: 'Back', combos: KEY.escape },
  { id: 'help', label: 'Help', combos: KEY.help },
];

const STATUS_LETTERS: Record<FileStatus, string> = {
  added: 'A',
  modified: 'M',
  deleted: 'D',
  renamed: 'R',
};

export function describeOutcome(outcome: RefreshOutcome): string {
  return (
    `${outcome.side} ${outcome.oldSha.slice(0, 7)} → ${outcome.newSha.slice(0, 7)}` +
    `${outcome.rebase ? ' (rebase)' : ''}, ${outcome.removedFileViews.length} viewed file(s) reset`
  );
}

/**
 * Files of one review, split into the ones still to look at and the ones
 * already viewed.
 */
export class ReviewDetailsView implements View {
  readonly viewType = 'review_details';

  private review: LoadingState<Review> = { status: 'init' };
  private diff: LoadingState<DiffFile[]> = { status: 'init' };
  private viewed = new Set<string>();
  private metadata: CommentMetadata = { filesWithComments: [], linesWithComments: {} };
  private list: FileList = 'not_viewed';
  private selected = 0;
  private lineMode = false;
  private lineIndex = 0;
  private status: string | null = null;

  constructor(readonly reviewId: string) {}

  get activeList(): FileList {
    return this.list;
  }

  get isLineMode(): boolean {
    return this.lineMode;
  }

  /**
   * Files of the active list, in diff order.
   */
  files(): DiffFile[] {
    if (this.diff.status !== 'loaded') return [];
    const wantViewed = this.list === 'viewed';
    return this.diff.data.filter((file) => this.viewed.has(file.path) === wantViewed);
  }

  selectedFile(): DiffFile | null {
    return this.files()[this.selected] ?? null;
  }

  selectedLine(): DiffLine | null {
    const file = this.selectedFile();
    if (!this.lineMode || !file) return null;
    return parseDiffLines(file.content)[this.lineIndex] ?? null;
  }

  handleKey(key: KeyInput, context: ViewContext): void {
    const action = findBinding(key, BINDINGS);

    switch (action) {
      case 'up':
      case 'down':
        this.move(action === 'up' ? -1 : 1);
        break;
      case 'not_viewed':
      case 'viewed':
        this.switchList(action);
        break;
      case 'toggle_viewed': {
        const file = this.selectedFile();
        if (file) context.publish({ type: 'file_view_toggle', reviewId: this.reviewId, filePath: file.path });
        break;
      }
      case 'line_mode':
        if (this.selectedFile()) {
          this.lineMode = !this.lineMode;
          this.lineIndex = 0;
        }
        break;
      case 'comments':
        this.openComments(context);
        break;
      case 'refresh':
        context.publish({ type: 'review_refresh_open', reviewId: this.reviewId });
        break;
      case 'back':
        if (this.lineMode) {
          this.lineMode = false;
        } else {
          context.publish({ type: 'view_close' });
        }
        break;
      case 'help':
        context.publish({ type: 'help_open', keybindings: this.keybindings() });
        break;
      case null:
        break;
    }
  }

  handleAppEvent(event: AppEvent, context: ViewContext): void {
    switch (event.type) {
      case 'review_loading_state':
        if (event.reviewId !== this.reviewId) return;
        this.review = event.state;
        if (event.state.status === 'loaded') {
          const review = event.state.data;
          context.publish({
            type: 'git_diff_load',
            reviewId: review.id,
            baseSha: review.baseSha,
            targetSha: review.targetSha,
          });
          context.publish({ type: 'file_views_load', reviewId: review.id });
          context.publish({ type: 'comment_metadata_load', reviewId: review.id });
        }
        break;
      case 'git_diff_loading_state':
        if (event.reviewId !== this.reviewId) return;
        this.diff = event.state;
        this.clampSelection();
        break;
      case 'file_views_loaded':
        if (event.reviewId !== this.reviewId) return;
        this.viewed = new Set(event.filePaths);
        this.clampSelection();
        break;
      case 'file_view_toggled':
        if (event.reviewId !== this.reviewId) return;
        if (event.viewed) {
          this.viewed.add(event.filePath);
        } else {
          this.viewed.delete(event.filePath);
        }
        this.lineMode = false;
        this.clampSelection();
        break;
      case 'comment_metadata_loaded':
        if (event.reviewId !== this.reviewId) return;
        this.metadata = event.metadata;
        break;
      case 'review_refreshed':
        if (event.reviewId !== this.reviewId) return;
        this.status = `Refreshed ${event.outcomes.map(describeOutcome).join('; ')}`;
        break;
    }
  }

  keybindings(): Keybinding[] {
    return BINDINGS;
  }

  render(): ViewRender {
    if (this.review.status !== 'loaded') {
      const message =
        this.review.status === 'not_found'
          ? 'Review not found.'
          : this.review.status === 'error'
            ? `Failed to load review: ${this.review.message}`
            : 'Loading review...';
      return { title: 'Review', lines: [message], modal: false };
    }

    const review = this.review.data;
    const lines = [`${review.baseSha.slice(0, 7)}..${review.targetSha.slice(0, 7)}`, ...this.driftNotices(review), ''];

    const notViewedCount = this.countFiles(false);
    const viewedCount = this.countFiles(true);
    lines.push(
      this.list === 'not_viewed'
        ? `[Not viewed (${notViewedCount})]  Viewed (${viewedCount})`
        : ` Not viewed (${notViewedCount})  [Viewed (${viewedCount})]`,
    );

    switch (this.diff.status) {
      case 'init':
      case 'loading':
        lines.push('Loading diff...');
        break;
      case 'error':
        lines.push(`Failed to load diff: ${this.diff.message}`);
        break;
      case 'not_found':
        lines.push('Diff not found.');
        break;
      case 'loaded':
        lines.push(...this.fileLines());
        break;
    }

    if (this.lineMode) {
      lines.push('', ...this.diffLines());
    }
    if (this.status) {
      lines.push('', this.status);
    }

    return { title: `${review.baseBranch} → ${review.targetBranch}`, lines, modal: false };
  }

  private fileLines(): string[] {
    const files = this.files();
    if (files.length === 0) {
      return [this.list === 'viewed' ? 'No viewed files.' : 'All files viewed.'];
    }

    const commented = new Set(this.metadata.filesWithComments);
    return files.map((file, index) => {
      const indicator = index === this.selected ? SELECTION_INDICATOR : ' ';
      const marker = commented.has(file.path) ? '*' : ' ';
      const name = file.renamedFrom ? `${file.renamedFrom} → ${file.path}` : file.path;
      const stats = file.binary ? 'binary' : `+${file.additions} -${file.deletions}`;
      return `${indicator}${marker}${STATUS_LETTERS[file.status]} ${name}  ${stats}`;
    });
  }

  private diffLines(): string[] {
    const file = this.selectedFile();
    if (!file) return [];

    const commentedLines = new Set(this.metadata.linesWithComments[file.path] ?? []);
    return parseDiffLines(file.content).map((line, index) => {
      const indicator = index === this.lineIndex ? SELECTION_INDICATOR : ' ';
      const marker = line.newLine !== null && commentedLines.has(line.newLine) ? '*' : ' ';
      const number = line.newLine === null ? '' : String(line.newLine);
      return `${indicator}${marker}${number.padStart(5)} ${line.text}`;
    });
  }

  private driftNotices(review: Review): string[] {
    const notices: string[] = [];
    if (review.baseBranchExists === false) notices.push(`Base branch ${review.baseBranch} no longer exists`);
    if (review.targetBranchExists === false) notices.push(`Target branch ${review.targetBranch} no longer exists`);
    if (review.baseShaChanged) notices.push(`Base moved to ${review.baseShaChanged.slice(0, 7)}, press r to refresh`);
    if (review.targetShaChanged) notices.push(`Target moved to ${review.targetShaChanged.slice(0, 7)}, press r to refresh`);
    return notices;
  }

  private countFiles(viewed: boolean): number {
    if (this.diff.status !== 'loaded') return 0;
    return this.diff.data.filter((file) => this.viewed.has(file.path) === viewed).length;
  }

  private move(delta: number): void {
    if (this.lineMode) {
      const file = this.selectedFile();
      const count = file ? parseDiffLines(file.content).length : 0;
      this.lineIndex = clampIndex(this.lineIndex, delta, count);
    } else {
      this.selected = clampIndex(this.selected, delta, this.files().length);
    }
  }

  private switchList(list: FileList): void {
    if (this.list === list) return;
    this.list = list;
    this.selected = 0;
    this.lineMode = false;
  }

  private clampSelection(): void {
    this.selected = clampIndex(this.selected, 0, this.files().length);
  }

  private openComments(context: ViewContext): void {
    const file = this.selectedFile();
    if (!file) return;

    let lineNumber: number | null = null;
    if (this.lineMode) {
      const line = this.selectedLine();
      if (!line || line.newLine === null) {
        this.status = 'Select an added or unchanged line to comment on it';
        return;
      }
      lineNumber = line.newLine;
    }

    this.status = null;
    context.publish({ type: 'comments_open', target: { reviewId: this.reviewId, filePath: file.path, lineNumber } });
  }
}
