export type TokenSource = "env" | "saved" | "prompt";

export interface SuppliedToken {
  token: string;
  source: TokenSource;
  /** Set when the token came from the environment. */
  envVar?: string;
}

export interface TokenSupplierPort {
  supplyToken(): Promise<SuppliedToken>;
}
