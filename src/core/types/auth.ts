export interface TokenClaims {
  tokenId: string;
  subject: string;
  tokenType: "static" | "dev";
}

export interface ApiTokenRecord {
  token: string;
  subject: string;
}
