import { Module } from "@nestjs/common";
import { InvoicesModule } from "../invoices/invoices.module";
import { PaymentsReceivedController } from "./payments-received.controller";
import { PaymentsReceivedService } from "./payments-received.service";
import { PaymentsReceivedRepository } from "./payments-received.repo";

@Module({
  imports: [InvoicesModule],
  controllers: [PaymentsReceivedController],
  providers: [PaymentsReceivedService, PaymentsReceivedRepository],
})
export class PaymentsReceivedModule {}
