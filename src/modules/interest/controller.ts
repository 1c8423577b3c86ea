import { toAccrualSummaryDto } from "../ledger/mappers";
import { InterestService } from "./service";

export class InterestController {
  constructor(private readonly service: InterestService) {}

  async accrue() {
    return toAccrualSummaryDto(await this.service.accrueDaily());
  }
}
