import { IsOptional, IsString } from 'class-validator';

export class GalleryQueryDto {
  /** Set by the delete redirect; unknown values are ignored. */
  @IsOptional()
  @IsString()
  notice?: string;
}
