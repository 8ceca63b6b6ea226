import { TEXT_CONTENT_TYPE } from "../../constants.js";

export async function handleHealthCheck(): Promise<Response> {
    return new Response("OK", { status: 200, headers: { "Content-Type": TEXT_CONTENT_TYPE } });
}
