import { Global, Module } from "@nestjs/common";
import { AppLoggingService } from "./services/logging.service";

@Global()
@Module({
  providers: [AppLoggingService],
  exports: [AppLoggingService],
})
export class LoggingModule {}
