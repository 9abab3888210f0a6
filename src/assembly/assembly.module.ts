import { Module } from "@nestjs/common";
import { IoModule } from "../io/io.module";
import { WorkspaceModule } from "../workspace/workspace.module";
import { AssemblyService } from "./assembly.service";

@Module({
  imports: [IoModule, WorkspaceModule],
  providers: [AssemblyService],
  exports: [AssemblyService],
})
export class AssemblyModule {}
