export interface GridSize {
  readonly rows: number;
  readonly columns: number;
}
