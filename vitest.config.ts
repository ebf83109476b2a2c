import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'audio': resolveFromRoot('src/audio'),
            'cli': resolveFromRoot('src/cli'),
            'config': resolveFromRoot('src/config'),
            'render': resolveFromRoot('src/render'),
            'util': resolveFromRoot('src/util'),
        },
    },
    test: {
        environment: 'jsdom',
        include: ['tests/unit/**/*.spec.ts'],
        setupFiles: ['tests/setup/vitest.setup.ts'],
        clearMocks: true,
        testTransformMode: { ssr: ['**/tests/unit/cli/**'] },
    },
});
