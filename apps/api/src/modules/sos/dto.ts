import { IsOptional, IsString, MaxLength } from "class-validator";
export class ContactsQueryDto {
  @IsOptional() @IsString() @MaxLength(100) country?: string;
}
