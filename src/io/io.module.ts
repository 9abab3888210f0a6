import { Module } from "@nestjs/common";
import { DocumentWriterService } from "./document-writer.service";
import { LoggerService } from "./logger.service";

@Module({
  providers: [LoggerService, DocumentWriterService],
  exports: [LoggerService, DocumentWriterService],
})
export class IoModule {}
