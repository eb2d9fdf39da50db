import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { createAnthropicVisionClient } from './inference/vision-client';
import { DiagnosisService } from './services/diagnosis.service';

dotenv.config();

const config = loadConfig();

const vision = createAnthropicVisionClient(config);

const diagnosis = new DiagnosisService({ vision, upload: config.upload });
const app = createApp({ diagnosis, config });

app.listen(config.port, () => {
  console.log(`Server running on port ${config.port} (model ${config.vision.model})`);
});
