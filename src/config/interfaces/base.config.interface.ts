import { ConfigApiInterface } from "./config.api.interface";
import { ConfigCorsInterface } from "./config.cors.interface";
import { ConfigLoggingInterface } from "./config.logging.interface";

export interface BaseConfigInterface {
  api: ConfigApiInterface;
  cors: ConfigCorsInterface;
  logging: ConfigLoggingInterface;
}
