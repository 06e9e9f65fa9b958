import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  ParseIntPipe,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiParam,
  ApiBody,
} from '@nestjs/swagger';
import {
  AccountResponseDto,
  BalanceResponseDto,
  TransferResponseDto,
} from './dto/account-response.dto';
import { HistoryEntryResponseDto } from './dto/history-entry-response.dto';
import { LoginDto } from './dto/login.dto';
import { MoneyMovementDto } from './dto/money-movement.dto';
import { OpenAccountDto } from './dto/open-account.dto';
import { TransferDto } from './dto/transfer.dto';
import { LedgerService } from './ledger.service';
import { formatMoney } from './money';

/**
 * HTTP surface over LedgerService. Holds no session: the acting account
 * comes from the path and money-moving requests carry its PIN.
 */
@ApiTags('accounts')
@Controller()
export class LedgerController {
  constructor(private readonly ledgerService: LedgerService) {}

  @Post('accounts')
  @ApiOperation({ summary: 'Open a new account' })
  @ApiResponse({ status: 201, type: AccountResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid input.' })
  @ApiResponse({ status: 409, description: 'Username already registered.' })
  async openAccount(@Body() dto: OpenAccountDto): Promise<AccountResponseDto> {
    const account = await this.ledgerService.openAccount({
      name: dto.name,
      initialBalance: dto.initialBalance,
      username: dto.username,
      password: dto.password,
      pin: dto.pin,
    });
    return AccountResponseDto.from(account);
  }

  @Post('sessions')
  @HttpCode(HttpStatus.OK)
  @ApiTags('sessions')
  @ApiOperation({ summary: 'Log in with username and password' })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 401, description: 'Invalid credentials.' })
  async login(@Body() dto: LoginDto): Promise<AccountResponseDto> {
    const account = await this.ledgerService.login(dto.username, dto.password);
    return AccountResponseDto.from(account);
  }

  @Get('accounts/:accountNumber')
  @ApiOperation({ summary: 'Get an account' })
  @ApiParam({ name: 'accountNumber' })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 404, description: 'Account not found.' })
  async getAccount(
    @Param('accountNumber', ParseIntPipe) accountNumber: number,
  ): Promise<AccountResponseDto> {
    return AccountResponseDto.from(
      await this.ledgerService.getAccount(accountNumber),
    );
  }

  @Get('accounts/:accountNumber/balance')
  @ApiOperation({ summary: 'Get account balance' })
  @ApiParam({ name: 'accountNumber' })
  @ApiResponse({ status: 200, type: BalanceResponseDto })
  @ApiResponse({ status: 404, description: 'Account not found.' })
  async getBalance(
    @Param('accountNumber', ParseIntPipe) accountNumber: number,
  ): Promise<BalanceResponseDto> {
    const balance = await this.ledgerService.getBalance(accountNumber);
    return { accountNumber, balance: formatMoney(balance) };
  }

  @Get('accounts/:accountNumber/history')
  @ApiOperation({ summary: 'Get transaction history, newest first' })
  @ApiParam({ name: 'accountNumber' })
  @ApiResponse({ status: 200, type: [HistoryEntryResponseDto] })
  @ApiResponse({ status: 404, description: 'Account not found.' })
  async getHistory(
    @Param('accountNumber', ParseIntPipe) accountNumber: number,
  ): Promise<HistoryEntryResponseDto[]> {
    const entries = await this.ledgerService.getHistory(accountNumber);
    return entries.map((entry) => HistoryEntryResponseDto.from(entry));
  }

  @Post('accounts/:accountNumber/deposit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Deposit into an account' })
  @ApiParam({ name: 'accountNumber' })
  @ApiBody({ type: MoneyMovementDto })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 401, description: 'Wrong PIN.' })
  @ApiResponse({ status: 404, description: 'Account not found.' })
  async deposit(
    @Param('accountNumber', ParseIntPipe) accountNumber: number,
    @Body() dto: MoneyMovementDto,
  ): Promise<AccountResponseDto> {
    await this.ledgerService.authorize(accountNumber, dto.pin);
    return AccountResponseDto.from(
      await this.ledgerService.deposit(accountNumber, dto.amount),
    );
  }

  @Post('accounts/:accountNumber/withdraw')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Withdraw from an account' })
  @ApiParam({ name: 'accountNumber' })
  @ApiBody({ type: MoneyMovementDto })
  @ApiResponse({ status: 200, type: AccountResponseDto })
  @ApiResponse({ status: 422, description: 'Insufficient funds.' })
  @ApiResponse({ status: 503, description: 'Account busy, retry.' })
  async withdraw(
    @Param('accountNumber', ParseIntPipe) accountNumber: number,
    @Body() dto: MoneyMovementDto,
  ): Promise<AccountResponseDto> {
    await this.ledgerService.authorize(accountNumber, dto.pin);
    return AccountResponseDto.from(
      await this.ledgerService.withdraw(accountNumber, dto.amount),
    );
  }

  @Post('accounts/:accountNumber/transfer')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Transfer to another account' })
  @ApiParam({ name: 'accountNumber', description: 'Sender account number' })
  @ApiBody({ type: TransferDto })
  @ApiResponse({ status: 200, type: TransferResponseDto })
  @ApiResponse({ status: 404, description: 'Receiver not found.' })
  @ApiResponse({ status: 422, description: 'Insufficient funds.' })
  async transfer(
    @Param('accountNumber', ParseIntPipe) accountNumber: number,
    @Body() dto: TransferDto,
  ): Promise<TransferResponseDto> {
    await this.ledgerService.authorize(accountNumber, dto.pin);
    const { sender, receiver } = await this.ledgerService.transfer(
      accountNumber,
      dto.to,
      dto.amount,
    );
    return {
      sender: AccountResponseDto.from(sender),
      receiver: AccountResponseDto.from(receiver),
    };
  }
}
