/**
 * Registra cada listener de este directorio (cada archivo se suscribe a sus hooks al importarse).
 */
import { autoRequireDirectory } from "../autoRequireDirectory";

export const loadedListeners = autoRequireDirectory(__dirname, "listeners");
