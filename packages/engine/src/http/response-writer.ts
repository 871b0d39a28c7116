import type { ITcpSocket } from "../interfaces/socket.js";
import type { HttpResponse } from "./response.js";

/**
 * Write a rendered response to the socket, waiting for the transport to
 * accept it when the socket supports backpressure.
 */
export async function writeResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = response.render();
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
    return;
  }
  socket.send(bytes);
}
