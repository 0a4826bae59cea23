import type { Color, PageId } from '../protocol/types.js';

export interface GridLayout {
  rows: number;
  cols: number;
}

export interface Cell {
  readonly char: string;
  readonly fg: Color;
  readonly bg: Color;
  readonly flags: number;
}

/** A clickable span on one grid row; `colEnd` is exclusive. */
export interface Link {
  readonly target: PageId;
  readonly row: number;
  readonly colStart: number;
  readonly colEnd: number;
  readonly explicit: boolean;
}

export interface PageNavigation {
  readonly previousPage: PageId | null;
  readonly nextPage: PageId | null;
  readonly previousSubpage: PageId | null;
  readonly nextSubpage: PageId | null;
}

export interface SectionLink {
  readonly label: string;
  readonly target: PageId;
}

export interface Page {
  readonly id: PageId;
  readonly title: string | null;
  readonly rows: number;
  readonly cols: number;
  readonly grid: ReadonlyArray<ReadonlyArray<Cell>>;
  readonly subpageCount: number;
  readonly links: ReadonlyArray<Link>;
  readonly navigation: PageNavigation;
  readonly sections: ReadonlyArray<SectionLink>;
  readonly fetchedAt: number;
}
