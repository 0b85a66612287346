import { IsBase64, IsEnum, IsNotEmpty, IsString } from 'class-validator';
import { PublicKeyEncryptionAlgorithm } from '../../keys/interfaces';

/**
 * JSON shape of one secure key attachment.
 */
export class SealedKeyDto {
  @IsString()
  @IsNotEmpty()
  publicKeyId!: string;

  @IsString()
  @IsNotEmpty()
  @IsBase64()
  encryptedKey!: string;

  @IsEnum(PublicKeyEncryptionAlgorithm)
  algorithm!: PublicKeyEncryptionAlgorithm;
}
