import {
	Body,
	Controller,
	ForbiddenException,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	Post,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { formatBalance, parseBalance } from "../common/balance";
import { LedgerService } from "./ledger.service";
import { GetAccountDto } from "./dto/get-account.dto";
import { CreditAccountInDto } from "./dto/credit-account.dto";

@ApiTags("2 - Ledger")
@ApiExtraModels(ApiEnvelopeShellDto, GetAccountDto)
@Controller("api/v1/ledger/accounts")
export class LedgerController {
	constructor(
		private readonly ledgerService: LedgerService,
		private readonly configService: ConfigService,
	) {}

	@Get(":accountId")
	@ApiParam({ name: "accountId", description: "Ledger account id" })
	@ApiOkResponse({
		description: "Account balance, zero for unknown accounts",
		schema: getSchemaPathForDto(GetAccountDto),
	})
	@ApiOperation({ summary: "Get the balance of a ledger account" })
	async getOne(
		@Param("accountId") accountId: string,
	): Promise<ApiEnvelope<GetAccountDto>> {
		const balance = await this.ledgerService.balanceOf(accountId);
		return envelope({ accountId, balance: formatBalance(balance) });
	}

	@Post(":accountId/credit")
	@HttpCode(HttpStatus.OK)
	@ApiParam({ name: "accountId", description: "Ledger account id" })
	@ApiBody({ type: CreditAccountInDto })
	@ApiOkResponse({
		description: "Account balance after the credit",
		schema: getSchemaPathForDto(GetAccountDto),
	})
	@ApiBadRequestResponse({ description: "Invalid amount" })
	@ApiForbiddenResponse({ description: "Faucet disabled" })
	@ApiOperation({
		summary: "Mint funds into an account (dev/test only, LEDGER_FAUCET_ENABLED)",
	})
	async credit(
		@Param("accountId") accountId: string,
		@Body() dto: CreditAccountInDto,
	): Promise<ApiEnvelope<GetAccountDto>> {
		if (this.configService.get<string>("LEDGER_FAUCET_ENABLED") !== "true") {
			throw new ForbiddenException("Ledger faucet is disabled");
		}
		const balance = await this.ledgerService.credit(
			accountId,
			parseBalance(dto.amount),
		);
		return envelope({ accountId, balance: formatBalance(balance) });
	}
}
