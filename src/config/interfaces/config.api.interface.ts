export interface ConfigApiInterface {
  port: number;
  env: string;
}
