import { IsString, IsNotEmpty, IsEmail, IsOptional } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class AdminLoginDto {
  @ApiProperty()
  @IsEmail()
  public email!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  public password!: string;
}

export class AdminLogoutDto {
  @ApiPropertyOptional({ description: 'Refresh token to revoke' })
  @IsString()
  @IsOptional()
  public refresh?: string;
}
