export { RatingsModule } from "./ratings.module.js";
export { type RatingValue, type RatingView, RatingsService } from "./ratings.service.js";
