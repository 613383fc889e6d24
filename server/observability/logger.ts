import winston from 'winston';
import WinstonCloudWatch from 'winston-cloudwatch';

interface CloudWatchConfig {
  logGroupName: string;
  logStreamName: string;
  awsOptions: {
    region: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
}

const { AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY } = process.env;

const cloudWatchConfig: CloudWatchConfig = {
  logGroupName: process.env.CLOUDWATCH_LOG_GROUP || 'jira-operations-mcp',
  logStreamName: 'dispatcher',
  awsOptions: {
    region: process.env.AWS_REGION || 'us-east-1',
    credentials: AWS_ACCESS_KEY_ID && AWS_SECRET_ACCESS_KEY
      ? { accessKeyId: AWS_ACCESS_KEY_ID, secretAccessKey: AWS_SECRET_ACCESS_KEY }
      : undefined,
  },
};

// stdout carries the MCP protocol in stdio mode, so every level goes to stderr
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: process.env.NODE_ENV === 'test' || process.env.TEST_MODE === 'true',
    stderrLevels: ALL_LEVELS,
  }),
];

if (AWS_ACCESS_KEY_ID) {
  transports.push(new WinstonCloudWatch(cloudWatchConfig));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports,
});
