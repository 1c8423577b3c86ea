import { toCents } from "../../common/money";
import { toTransferDto } from "../ledger/mappers";
import type { MutationRequestOptions } from "../accounts/service";
import { TransferService } from "./service";
import type { TransferBody } from "./schemas";

export class TransfersController {
  constructor(private readonly service: TransferService) {}

  async transfer(body: TransferBody, options?: MutationRequestOptions) {
    const confirmation = await this.service.transfer(
      {
        fromAccountId: body.fromAccountId,
        toAccountId: body.toAccountId,
        amountCents: toCents(body.amount)
      },
      options
    );
    return toTransferDto(confirmation);
  }
}
