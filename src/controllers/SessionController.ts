import {
    Body,
    Delete,
    Get,
    HttpCode,
    JsonController,
    OnUndefined,
    Param,
    Post,
    Res,
} from 'routing-controllers';
import { Response } from 'express';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator';
import { Service } from 'typedi';
import { HistoryService } from '../services/history/HistoryService';
import { ImageService } from '../services/image/ImageService';
import { SessionStore } from '../services/session/SessionStore';

export class CreateSessionRequest {
    @IsOptional()
    @IsBoolean()
    persist?: boolean;
}

export class SettingsRequest {
    @IsBoolean()
    persist!: boolean;
}

export class UploadImageRequest {
    @IsString()
    @IsNotEmpty()
    @Matches(/^data:image\/[a-z0-9.+-]+;base64,/i)
    dataUrl!: string;

    @IsOptional()
    @IsString()
    filename?: string;
}

@Service()
@JsonController('/api/sessions')
export class SessionController {
    constructor(
        private readonly sessionStore: SessionStore,
        private readonly historyService: HistoryService,
        private readonly imageService: ImageService,
    ) { }

    @Post()
    @HttpCode(201)
    createSession(@Body({ required: false }) body: CreateSessionRequest = {}) {
        const session = this.sessionStore.create({ persist: body.persist });
        console.log(`[SessionController] Created session ${session.id}`);
        return session.snapshot();
    }

    @Get('/:sessionId')
    getSession(@Param('sessionId') sessionId: string) {
        return this.sessionStore.get(sessionId).snapshot();
    }

    @Delete('/:sessionId')
    @OnUndefined(204)
    deleteSession(@Param('sessionId') sessionId: string): void {
        this.sessionStore.delete(sessionId);
    }

    @Post('/:sessionId/settings')
    updateSettings(
        @Param('sessionId') sessionId: string,
        @Body() body: SettingsRequest,
    ) {
        const { result, warning } = this.historyService.setPersistence(sessionId, body.persist);
        return { ...result, warning };
    }

    @Post('/:sessionId/image')
    uploadImage(
        @Param('sessionId') sessionId: string,
        @Body() body: UploadImageRequest,
    ) {
        const image = this.imageService.upload(sessionId, body.dataUrl);
        return {
            image,
            achievements: this.sessionStore.get(sessionId).getAchievements(),
        };
    }

    @Get('/:sessionId/image')
    previewImage(
        @Param('sessionId') sessionId: string,
        @Res() response: Response,
    ) {
        const image = this.imageService.preview(sessionId);
        response.setHeader('Content-Type', image.mediaType);
        response.setHeader('Cache-Control', 'no-store');
        return response.send(image.data);
    }
}
