export const MIN_PAGE_NUMBER = 100;
export const MAX_PAGE_NUMBER = 999;

export interface PageId {
  readonly number: number;
  readonly subpage: number;
}

export const COLORS = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;

export type Color = (typeof COLORS)[number];

export enum CellFlag {
  None = 0,
  Bold = 1 << 0,
  Blink = 1 << 1,
  DoubleHeight = 1 << 2,
}

export interface CellStyle {
  readonly fg: Color;
  readonly bg: Color;
  readonly flags: number;
}

export const DEFAULT_STYLE: CellStyle = Object.freeze({ fg: 'white', bg: 'black', flags: CellFlag.None });

export type Token =
  | {
      type: 'text';
      text: string;
    }
  | {
      type: 'line_break';
    }
  | {
      type: 'style';
      style: CellStyle;
    }
  | {
      type: 'link_start';
      target: PageId;
    }
  | {
      type: 'link_end';
    };

export type TokenKind = Token['type'];

export interface HeaderLink {
  label: string;
  target: PageId;
}

export interface DecodedHeader {
  title: string | null;
  navigation: HeaderLink[];
  subpageCount: number | null;
  sections: HeaderLink[];
}

export interface DecodedStream {
  header: DecodedHeader;
  tokens: Token[];
}
