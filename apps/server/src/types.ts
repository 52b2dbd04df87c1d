export type CellValue = string | number | boolean | null;

export type ReviewRow = Record<string, CellValue>;

export interface ReviewTable {
  columns: string[];
  rows: ReviewRow[];
}

export interface ReviewCapabilities {
  hasCategory: boolean;
  hasScore: boolean;
}

export type NoticeLevel = 'info' | 'warning';

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export interface ChartPoint {
  label: string;
  value: number;
}

export type ChartPanel =
  | { kind: 'chart'; title: string; points: ChartPoint[] }
  | { kind: 'notice'; title: string; notice: Notice };

export interface ReviewsPage {
  caption: string;
  rowCount: number;
  columns: string[];
  productOptions: string[];
  selectedProduct: string;
  filterWarning?: Notice;
  meanByProduct: ChartPanel;
  reviews: {
    title: string;
    columns: string[];
    rows: ReviewRow[];
  };
  histogram: ChartPanel;
}

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  text: string;
}

export type ConversationState = readonly ConversationTurn[];
