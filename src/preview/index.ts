export * from "./clients/cloudfront.client.js";
export * from "./clients/github.client.js";
export * from "./clients/route53.client.js";
export * from "./clients/s3.client.js";
export * from "./config/preview.config.js";
export * from "./controllers/environment.controller.js";
export * from "./errors/ConfigurationError.js";
export * from "./errors/DistributionStateError.js";
export * from "./errors/NotFoundError.js";
export * from "./errors/StepError.js";
export * from "./errors/UploadError.js";
export * from "./errors/WaitTimeoutError.js";
export * from "./models/distribution-state.model.js";
export * from "./services/bucket-policy.service.js";
export * from "./services/bucket.service.js";
export * from "./services/cache-invalidation.service.js";
export * from "./services/content-sync.service.js";
export * from "./services/distribution-locator.service.js";
export * from "./services/distribution.service.js";
export * from "./services/dns-record.service.js";
export * from "./services/origin-access-control.service.js";
export * from "./utils/clock.utils.js";
export * from "./utils/content-type.utils.js";
export * from "./utils/identity.utils.js";
