import fp from "fastify-plugin";
import multipart from '@fastify/multipart';

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024; // 10MB

export default fp(async (app) => {
    await app.register(multipart, {
        limits: {
            fileSize: MAX_UPLOAD_BYTES,
        },
    });
});
