import { beforeEach } from 'vitest';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

Logger.setConsoleOutput(false);

beforeEach(() => {
  EventBus.clear();
});
