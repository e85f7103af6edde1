import { registerAs } from '@nestjs/config';
import { IsNotEmpty, IsString } from 'class-validator';
import { validateConfig } from './config-validation';

/**
 * Message bus configuration (Google Cloud Pub/Sub)
 */
export class BusConfig {
  @IsString()
  @IsNotEmpty()
  projectId!: string;

  @IsString()
  @IsNotEmpty()
  topic!: string;

  @IsString()
  @IsNotEmpty()
  subscription!: string;
}

export default registerAs('bus', (): BusConfig => {
  const rawConfig = {
    projectId: process.env.PUBSUB_PROJECT_ID,
    topic: process.env.BUS_TOPIC || 'queriestoprocess',
    subscription: process.env.BUS_SUBSCRIPTION || 'dbworkersub',
  };

  return validateConfig(rawConfig, 'bus', BusConfig);
});
