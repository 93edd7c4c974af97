export type Headers = Record<string, string | undefined>;

export interface ApiResponse<TBody = unknown> {
  status: number;
  body: TBody;
}
