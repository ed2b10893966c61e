export interface ConfigLoggingInterface {
  level: string;
  console: boolean;
  loki: ConfigLokiInterface;
}

export interface ConfigLokiInterface {
  enabled: boolean;
  host: string;
  batching: boolean;
  interval: number;
  labels: {
    application: string;
    environment: string;
  };
}
