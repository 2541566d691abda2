// EC2
export {
  EC2Service,
  type EC2Credentials,
} from "./ec2/ec2-service";

// Errors
export {
  awsErrorName,
  isNotFoundError,
  isTransientError,
  toQueryError,
} from "./errors/aws-errors";
