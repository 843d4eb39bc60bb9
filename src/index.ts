import { createApp } from '@/app';
import { loadRuntimeConfig } from '@/config/runtime';
import { createOzoneProvider } from '@/services/providers';

const config = loadRuntimeConfig();
const ozoneProvider = createOzoneProvider(config);
const app = createApp(ozoneProvider);

app.listen(config.port, () => {
  console.log(`Server running at http://localhost:${config.port}`);
  console.log(`Ozone provider: ${ozoneProvider.name}`);
});
