import Docker from "dockerode";

export type ContainerImage = {
  container: string;
  image: string;
};

// The part of the Docker client used here; tests substitute a stub.
export type ContainerSource = {
  listContainers: (options?: {
    filters?: Record<string, string[]>;
  }) => Promise<Array<Pick<Docker.ContainerInfo, "Id" | "Names" | "Image">>>;
};

export const connectDocker = (socketPath: string): ContainerSource => {
  return new Docker({ socketPath });
};

// Containers started from an image ID rather than a name carry no tag to check.
const isImageId = (image: string) => /^(sha256:)?[0-9a-f]{12,64}$/.test(image);

export const listContainerImages = async (docker: ContainerSource): Promise<ContainerImage[]> => {
  const containers = await docker.listContainers({ filters: { status: ["running"] } });
  return containers
    .filter((item) => item.Image && !isImageId(item.Image))
    .map((item) => ({
      container: (item.Names?.[0] ?? item.Id).replace(/^\//, ""),
      image: item.Image
    }));
};
