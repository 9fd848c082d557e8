export const NAME = 'gpuboard';
export const VERSION = '1.0.0';
