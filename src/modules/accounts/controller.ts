import { toCents } from "../../common/money";
import {
  toAccountInfoDto,
  toBalanceDto,
  toInterestRecordDto,
  toReconciliationDto
} from "../ledger/mappers";
import { AccountQueryService } from "./queries";
import { AccountsService, MutationRequestOptions } from "./service";

export class AccountsController {
  constructor(
    private readonly service: AccountsService,
    private readonly queries: AccountQueryService
  ) {}

  async getAccountInfo(accountId: string) {
    return toAccountInfoDto(await this.service.getAccountInfo(accountId));
  }

  async deposit(accountId: string, amount: number, options?: MutationRequestOptions) {
    return toBalanceDto(await this.service.deposit(accountId, toCents(amount), options));
  }

  async withdraw(accountId: string, amount: number, options?: MutationRequestOptions) {
    return toBalanceDto(await this.service.withdraw(accountId, toCents(amount), options));
  }

  async interestHistory(accountId: string) {
    const records = await this.queries.getInterestHistory(accountId);
    return records.map(toInterestRecordDto);
  }

  async reconcile(accountId: string) {
    return toReconciliationDto(await this.queries.reconcile(accountId));
  }
}
