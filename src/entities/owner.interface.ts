export interface Owner {
  id: string;
  issuer: string;
}
