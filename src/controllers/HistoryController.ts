import {
    Body,
    Delete,
    Get,
    JsonController,
    Param,
    Post,
    Res,
} from 'routing-controllers';
import { Response } from 'express';
import { IsInt, Max, Min } from 'class-validator';
import { Service } from 'typedi';
import { HistoryService } from '../services/history/HistoryService';

export class RatingRequest {
    @IsInt()
    @Min(1)
    @Max(5)
    value!: number;
}

@Service()
@JsonController('/api/sessions/:sessionId/history')
export class HistoryController {
    constructor(private readonly historyService: HistoryService) { }

    @Get()
    getHistory(@Param('sessionId') sessionId: string) {
        return this.historyService.list(sessionId);
    }

    @Delete()
    clearHistory(@Param('sessionId') sessionId: string) {
        const { result, warning } = this.historyService.clear(sessionId);
        return { ...result, warning };
    }

    @Get('/export')
    exportHistory(
        @Param('sessionId') sessionId: string,
        @Res() response: Response,
    ) {
        const payload = this.historyService.exportHistory(sessionId);
        response.setHeader('Content-Type', 'application/json; charset=utf-8');
        response.setHeader('Content-Disposition', 'attachment; filename="vision_history.json"');
        return response.send(payload);
    }

    @Get('/latest/answer')
    downloadLatestAnswer(
        @Param('sessionId') sessionId: string,
        @Res() response: Response,
    ) {
        const payload = this.historyService.latestAnswer(sessionId);
        response.setHeader('Content-Type', 'text/plain; charset=utf-8');
        response.setHeader('Content-Disposition', 'attachment; filename="latest_answer.txt"');
        return response.send(payload);
    }

    @Post('/:entryRef/rating')
    rateEntry(
        @Param('sessionId') sessionId: string,
        @Param('entryRef') entryRef: string,
        @Body() body: RatingRequest,
    ) {
        const { result, warning } = this.historyService.rate(sessionId, entryRef, body.value);
        return { entry: result, warning };
    }

    @Post('/:entryRef/pin')
    togglePin(
        @Param('sessionId') sessionId: string,
        @Param('entryRef') entryRef: string,
    ) {
        const { result, warning } = this.historyService.togglePin(sessionId, entryRef);
        return { entry: result, warning };
    }
}
