import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  Inject,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth, ApiConsumes } from '@nestjs/swagger';
import type {
  AccountService,
  Address,
  AuthResult,
  AuthTokens,
  ProfileStats,
  PublicUser,
  User,
} from '@contractor-connect/core';
import { ACCOUNT_SERVICE } from '../core/core.module.js';
import { toUploadInput, type MemoryFile } from '../../common/index.js';
import { CurrentUser, Public } from './decorators.js';
import {
  RegisterDto,
  LoginDto,
  RefreshTokenDto,
  ChangePasswordDto,
  UserSearchQueryDto,
  UpdateProfileDto,
  CreateAddressDto,
  UpdateAddressDto,
} from './dto/index.js';

@ApiTags('auth')
@ApiBearerAuth()
@Controller('auth')
export class AuthController {
  constructor(@Inject(ACCOUNT_SERVICE) private readonly accounts: AccountService) {}

  // ==========================================================================
  // Registration and tokens
  // ==========================================================================

  @Public()
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Register a client or contractor account' })
  @ApiResponse({ status: 201, description: 'User created, tokens issued' })
  @ApiResponse({ status: 409, description: 'E-mail or username taken' })
  public async register(@Body() dto: RegisterDto): Promise<AuthResult> {
    return this.accounts.register({ ...dto });
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Log in with e-mail and password' })
  @ApiResponse({ status: 400, description: 'Invalid credentials or disabled account' })
  public async login(@Body() dto: LoginDto): Promise<AuthResult> {
    return this.accounts.login(dto.email, dto.password);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Revoke the refresh token and go offline' })
  public async logout(@CurrentUser() user: User, @Body() dto: RefreshTokenDto): Promise<{ message: string }> {
    await this.accounts.logout(user.id, dto.refresh);
    return { message: 'Successfully logged out' };
  }

  @Public()
  @Post('token/refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Rotate a refresh token' })
  @ApiResponse({ status: 401, description: 'Invalid, expired or revoked token' })
  public async refresh(@Body() dto: RefreshTokenDto): Promise<AuthTokens> {
    return this.accounts.refresh(dto.refresh);
  }

  // ==========================================================================
  // Profile
  // ==========================================================================

  @Get('profile')
  @ApiOperation({ summary: 'Own profile' })
  public async getProfile(@CurrentUser() user: User): Promise<PublicUser> {
    return this.accounts.getProfile(user.id);
  }

  @Patch('profile')
  @ApiOperation({ summary: 'Update own profile' })
  public async updateProfile(@CurrentUser() user: User, @Body() dto: UpdateProfileDto): Promise<PublicUser> {
    return this.accounts.updateProfile(user.id, { ...dto });
  }

  @Get('profile/stats')
  @ApiOperation({ summary: 'Membership and project counters' })
  public async profileStats(@CurrentUser() user: User): Promise<ProfileStats> {
    return this.accounts.profileStats(user.id);
  }

  @Post('profile/avatar')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('avatar'))
  @ApiConsumes('multipart/form-data')
  @ApiOperation({ summary: 'Upload a new avatar (JPEG, PNG, GIF or WebP, 5MB max)' })
  public async uploadAvatar(
    @CurrentUser() user: User,
    @UploadedFile() file: MemoryFile | undefined
  ): Promise<{ avatar: string }> {
    return this.accounts.uploadAvatar(user.id, toUploadInput(file, 'avatar'));
  }

  @Post('change-password')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Change own password' })
  public async changePassword(@CurrentUser() user: User, @Body() dto: ChangePasswordDto): Promise<{ message: string }> {
    await this.accounts.changePassword(user.id, { ...dto });
    return { message: 'Password changed successfully' };
  }

  // ==========================================================================
  // Addresses
  // ==========================================================================

  @Get('addresses')
  public async listAddresses(@CurrentUser() user: User): Promise<Address[]> {
    return this.accounts.listAddresses(user.id);
  }

  @Post('addresses')
  @HttpCode(HttpStatus.CREATED)
  public async createAddress(@CurrentUser() user: User, @Body() dto: CreateAddressDto): Promise<Address> {
    return this.accounts.createAddress(user.id, { ...dto });
  }

  @Get('addresses/:id')
  @ApiParam({ name: 'id', description: 'Address ID' })
  @ApiResponse({ status: 404, description: 'Missing or owned by another user' })
  public async getAddress(@CurrentUser() user: User, @Param('id') id: string): Promise<Address> {
    return this.accounts.getAddress(user.id, id);
  }

  @Patch('addresses/:id')
  @ApiParam({ name: 'id', description: 'Address ID' })
  public async updateAddress(
    @CurrentUser() user: User,
    @Param('id') id: string,
    @Body() dto: UpdateAddressDto
  ): Promise<Address> {
    return this.accounts.updateAddress(user.id, id, { ...dto });
  }

  @Delete('addresses/:id')
  @ApiParam({ name: 'id', description: 'Address ID' })
  public async deleteAddress(@CurrentUser() user: User, @Param('id') id: string): Promise<void> {
    await this.accounts.deleteAddress(user.id, id);
  }

  // ==========================================================================
  // Directory
  // ==========================================================================

  @Get('users/search')
  @ApiOperation({ summary: 'Find active users by name, username or e-mail' })
  public async searchUsers(@Query() query: UserSearchQueryDto): Promise<PublicUser[]> {
    return this.accounts.searchUsers(query.q ?? '', query.userType);
  }
}
