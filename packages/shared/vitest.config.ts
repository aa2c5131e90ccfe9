import { defineConfig as defineBaseConfig } from '../../tools/vitest-config/src/index';
import { defineConfig } from 'vitest/config';

export default defineConfig(defineBaseConfig({ name: 'shared' }));
