import { IsString, IsUrl } from 'class-validator';

export class DownloadPostDto {
  @IsString()
  @IsUrl({ require_protocol: true }, { message: 'url must be a valid URL' })
  url!: string;
}
