import { IsEmail, IsString, Length } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export class GuestCancelDto {
  @ApiProperty()
  @IsEmail()
  email!: string;
}

export class GuestLookupDto extends GuestCancelDto {
  @ApiProperty({ example: 'O000000001' })
  @IsString()
  @Length(1, 10)
  orderCode!: string;
}
