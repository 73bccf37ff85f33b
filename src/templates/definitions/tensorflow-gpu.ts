import type { BootstrapProfile } from '../schema.js'

export const tensorflowGpu: BootstrapProfile = {
  id: 'tensorflow-gpu',
  name: 'TensorFlow + PyTorch (CUDA 11.8)',
  description:
    'Private Miniconda with a Python 3.9 environment carrying GPU builds of TensorFlow 2.15 and PyTorch 2.1, plus JupyterLab and common data tooling.',
  installerUrl: 'https://repo.anaconda.com/miniconda/Miniconda3-4.7.12.1-Linux-x86_64.sh',
  environmentName: 'tensorflow2_p39',
  pythonVersion: '3.9',
  packages: [
    {
      id: 'install-cuda',
      description: 'Install CUDA toolkit and cuDNN',
      manager: 'conda',
      specs: ['cudatoolkit=11.8', 'cudnn'],
    },
    {
      id: 'install-ipykernel',
      description: 'Install ipykernel',
      manager: 'pip',
      specs: ['ipykernel'],
      flags: ['--quiet'],
    },
    {
      id: 'install-pytorch',
      description: 'Install PyTorch with CUDA support',
      manager: 'pip',
      specs: ['torch==2.1.0', 'torchvision==0.16.0', 'torchaudio==2.1.0'],
      indexUrl: 'https://download.pytorch.org/whl/cu118',
    },
    {
      id: 'install-tensorflow',
      description: 'Install TensorFlow',
      manager: 'pip',
      specs: ['tensorflow==2.15.0'],
    },
    {
      id: 'install-tooling',
      description: 'Install data tooling',
      manager: 'conda',
      specs: ['setuptools', 'tiktoken', 'tqdm', 'numpy', 'pandas', 'psutil'],
    },
    {
      id: 'install-jupyterlab',
      description: 'Install JupyterLab',
      manager: 'conda',
      specs: ['jupyterlab==4.0'],
    },
    {
      id: 'install-matplotlib',
      description: 'Install matplotlib',
      manager: 'pip',
      specs: ['matplotlib==3.7.1'],
    },
  ],
}
