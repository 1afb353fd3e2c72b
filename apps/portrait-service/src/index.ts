import { createFaceDetector, logger } from "portrait-extractor";

import { createApp } from "./app.js";
import { loadEnv } from "./env.js";

const env = loadEnv();

const detector = createFaceDetector({
  backend: env.DETECTOR_BACKEND,
  humanModelsDir: env.HUMAN_MODELS_PATH,
  cascadePath: env.CASCADE_MODEL_PATH,
});

const app = createApp({ detector, env });

// Start server
app.listen(env.PORT, () => {
  logger.info(
    { port: env.PORT, detector: detector.backend },
    `Portrait service listening on port ${env.PORT}`,
  );
});
