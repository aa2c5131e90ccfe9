import { defineConfig as defineBaseConfig } from '../vitest-config/src/index';
import { defineConfig } from 'vitest/config';

export default defineConfig(defineBaseConfig({ name: 'logger' }));
