/**
 * @module
 * Selection of an image build backend.
 */
import {
    ConfigurationError,
} from '../errors';
import {
    BuildxImageBuilder,
} from './buildx';
import {
    BACKEND_KINDS,
    ImageBuilder,
} from './image-builder';
import {
    KanikoBuilderOptions,
    KanikoImageBuilder,
} from './kaniko';
import {
    NativeBuilderOptions,
    NativeImageBuilder,
} from './native';

/**
 * A backend and its options.
 */
export type BackendConfig =
    | ({ kind: 'native' } & NativeBuilderOptions)
    | { kind: 'buildx' }
    | ({ kind: 'kaniko' } & KanikoBuilderOptions);

/**
 * Returns the image builder for a backend name or configuration.
 *
 * @throws ConfigurationError for an unknown backend name.
 */
export function createImageBuilder(backend: BackendConfig | string): ImageBuilder {
    const config = typeof backend === 'string' ? backendConfig(backend) : backend;
    switch (config.kind) {
    case 'native':
        return new NativeImageBuilder(config);
    case 'buildx':
        return new BuildxImageBuilder();
    case 'kaniko':
        return new KanikoImageBuilder(config);
    }
}

function backendConfig(kind: string): BackendConfig {
    switch (kind) {
    case 'native':
    case 'buildx':
    case 'kaniko':
        return { kind };
    default:
        throw new ConfigurationError(`unknown image build backend ${JSON.stringify(kind)}, expected one of ${BACKEND_KINDS.join(', ')}`);
    }
}
