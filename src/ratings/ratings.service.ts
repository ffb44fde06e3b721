import { Injectable, Logger } from "@nestjs/common";
import { RequestLedger } from "../ledger/index.js";

export type RatingValue = 1 | -1;

export interface RatingView {
  request_id: string;
  response_id: string | null;
  rating: RatingValue;
  feedback: string | null;
  rated_at: string;
}

@Injectable()
export class RatingsService {
  private readonly logger = new Logger(RatingsService.name);

  constructor(private readonly ledger: RequestLedger) {}

  /**
   * Rates a request addressed by its request id or upstream response id.
   * Rating again replaces the previous rating.
   */
  async rate(
    organizationId: string,
    reference: string,
    rating: RatingValue,
    feedback?: string | null,
  ): Promise<RatingView> {
    const request = await this.ledger.getOwned(organizationId, reference);
    const ratedAt = new Date();
    await this.ledger.update(request.requestId, {
      rating,
      ratingFeedback: feedback ?? null,
      ratedAt,
    });
    this.logger.log(`Request ${request.requestId} rated ${rating}`);
    return {
      request_id: request.requestId,
      response_id: request.responseId,
      rating,
      feedback: feedback ?? null,
      rated_at: ratedAt.toISOString(),
    };
  }
}
