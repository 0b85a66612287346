import { IsBase64, IsNotEmpty, IsString } from 'class-validator';

/**
 * JSON shape of the secure body attachment.
 */
export class SecureDataDto {
  @IsString()
  @IsNotEmpty()
  @IsBase64()
  encryptedData!: string;

  @IsString()
  @IsNotEmpty()
  @IsBase64()
  initVectorKeyID!: string;
}
