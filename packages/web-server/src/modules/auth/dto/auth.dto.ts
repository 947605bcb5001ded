import { IsString, IsNotEmpty, IsEmail, IsOptional, IsIn, MinLength, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { USER_TYPES, type UserType } from '@contractor-connect/core';

const MIN_PASSWORD_LENGTH = 8;

export class RegisterDto {
  @ApiProperty({ example: 'jane@example.com' })
  @IsEmail()
  public email!: string;

  @ApiProperty({ example: 'jane' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  public username!: string;

  @ApiProperty({ minLength: MIN_PASSWORD_LENGTH })
  @IsString()
  @MinLength(MIN_PASSWORD_LENGTH)
  public password!: string;

  @ApiProperty()
  @IsString()
  public passwordConfirm!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public firstName?: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  public lastName?: string;

  @ApiPropertyOptional({ example: '+15551234567' })
  @IsString()
  @IsOptional()
  public phone?: string;

  @ApiPropertyOptional({ enum: USER_TYPES, default: 'client' })
  @IsIn(USER_TYPES)
  @IsOptional()
  public userType?: UserType;

  @ApiPropertyOptional({ maxLength: 500 })
  @IsString()
  @IsOptional()
  public bio?: string;
}

export class LoginDto {
  @ApiProperty()
  @IsEmail()
  public email!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public password!: string;
}

export class RefreshTokenDto {
  @ApiProperty({ description: 'Refresh token' })
  @IsString()
  @IsNotEmpty()
  public refresh!: string;
}

export class ChangePasswordDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public oldPassword!: string;

  @ApiProperty({ minLength: MIN_PASSWORD_LENGTH })
  @IsString()
  @MinLength(MIN_PASSWORD_LENGTH)
  public newPassword!: string;

  @ApiProperty()
  @IsString()
  public newPasswordConfirm!: string;
}

export class UserSearchQueryDto {
  @ApiPropertyOptional({ description: 'Matches username, names and e-mail' })
  @IsString()
  @IsOptional()
  public q?: string;

  @ApiPropertyOptional({ enum: USER_TYPES })
  @IsIn(USER_TYPES)
  @IsOptional()
  public userType?: UserType;
}
