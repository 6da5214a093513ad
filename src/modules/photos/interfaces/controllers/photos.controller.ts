import {
  BadRequestException,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { PhotosService } from '../../application/photos.service';
import type { UploadCandidate } from '../../domain/upload-policy';
import { GalleryQueryDto } from '../dto/gallery-query.dto';
import { PaginationQueryDto } from '../dto/pagination-query.dto';
import { toPhotoSummary } from '../presenters/photo.presenter';

const GALLERY_PATH = '/';

// Nest sets its default status (200, or 201 for POST) before the handler runs
// and Fastify's redirect() keeps a status that is already set
const redirectToGallery = (reply: FastifyReply, notice?: string) =>
  reply
    .code(HttpStatus.FOUND)
    .redirect(notice ? `${GALLERY_PATH}?notice=${notice}` : GALLERY_PATH);

const NO_CACHE_HEADERS = {
  'Cache-Control': 'no-cache, no-store, must-revalidate, private',
  Pragma: 'no-cache',
  Expires: '0',
} as const;

const NOTICES: Record<string, { successMessage?: string; errorMessage?: string }> = {
  deleted: { successMessage: 'Photo deleted successfully' },
  'not-found': { errorMessage: 'Photo not found' },
};

@Controller()
export class PhotosController {
  constructor(private readonly photosService: PhotosService) {}

  @Get()
  async gallery(@Query() query: GalleryQueryDto) {
    const photos = await this.photosService.getAllPhotos();
    const notice = query.notice ? NOTICES[query.notice] : undefined;

    return {
      photos: photos.map(toPhotoSummary),
      timestamp: new Date().toISOString(),
      ...notice,
    };
  }

  @Get('photos')
  async listPhotos(@Query() query: PaginationQueryDto) {
    const page = await this.photosService.getPage(query.limit, query.offset);
    return { ...page, photos: page.photos.map(toPhotoSummary) };
  }

  @Post('upload')
  @HttpCode(200)
  async upload(@Req() req: FastifyRequest) {
    if (!req.isMultipart()) {
      throw new BadRequestException('Request must be multipart/form-data');
    }

    const candidates: UploadCandidate[] = [];
    for await (const part of req.files()) {
      const data = await part.toBuffer();
      candidates.push({
        fileName: part.filename,
        mimeType: part.mimetype,
        // Truncated parts went past the multipart size limit
        size: part.file.truncated ? Number.POSITIVE_INFINITY : data.length,
        data,
      });
    }

    if (candidates.length === 0) {
      throw new BadRequestException('At least one file is required');
    }

    return this.photosService.uploadPhotos(candidates);
  }

  @Get('photo/:id')
  async servePhoto(@Param('id') id: string, @Res() reply: FastifyReply): Promise<void> {
    const photo = await this.photosService.getPhotoById(id);
    if (!photo) {
      throw new NotFoundException('Photo not found');
    }

    await reply
      .headers(NO_CACHE_HEADERS)
      .header('X-Photo-ID', photo.id)
      .header('X-Photo-Name', encodeURIComponent(photo.originalFileName))
      .type(photo.mimeType)
      .send(photo.photoData);
  }

  @Get('detail/:id')
  async detail(@Param('id') id: string, @Res() reply: FastifyReply): Promise<void> {
    const photo = await this.photosService.getPhotoById(id);
    if (!photo) {
      await redirectToGallery(reply);
      return;
    }

    const navigation = await this.photosService.getNavigation(photo);
    await reply.send({ photo: toPhotoSummary(photo), ...navigation });
  }

  @Post('detail/:id/delete')
  async deleteFromDetail(@Param('id') id: string, @Res() reply: FastifyReply): Promise<void> {
    const deleted = await this.photosService.deletePhoto(id);
    await redirectToGallery(reply, deleted ? 'deleted' : 'not-found');
  }

  @Delete('photos/:id')
  async deletePhoto(@Param('id') id: string) {
    const deleted = await this.photosService.deletePhoto(id);
    return { deleted };
  }
}
